import { log } from "./logger.js";

/**
 * Token counting abstraction. Chunk windows are measured in tokens of the
 * embedding model, so the tokenizer must match the model in use.
 */
export interface Tokenizer {
  readonly name: string;
  encode(text: string): number[];
  decode(tokens: readonly number[]): string;
  /**
   * `result[k]` is true when `tokens.slice(0, k)` ends on a character
   * boundary, so a cut at `k` decodes cleanly on both sides. Length is
   * `tokens.length + 1`.
   */
  charBoundaries(tokens: readonly number[]): boolean[];
}

/**
 * One token per Unicode code point. Used when no model encoding is available
 * and in tests, where exact token arithmetic matters.
 */
export class CodePointTokenizer implements Tokenizer {
  readonly name = "codepoint";

  encode(text: string): number[] {
    const out: number[] = [];
    for (const ch of text) {
      const cp = ch.codePointAt(0);
      if (cp !== undefined) out.push(cp);
    }
    return out;
  }

  decode(tokens: readonly number[]): string {
    return String.fromCodePoint(...tokens);
  }

  charBoundaries(tokens: readonly number[]): boolean[] {
    return new Array<boolean>(tokens.length + 1).fill(true);
  }
}

/** Minimal shape of a tiktoken encoder. */
interface TiktokenEncoding {
  encode(text: string): Uint32Array;
  decode(tokens: Uint32Array): Uint8Array;
  decode_single_token_bytes(token: number): Uint8Array;
}

/** Continuation bytes still owed after a UTF-8 lead byte. */
function continuationsAfter(byte: number): number {
  if (byte >= 0xf0) return 3;
  if (byte >= 0xe0) return 2;
  if (byte >= 0xc0) return 1;
  return 0;
}

export class TiktokenTokenizer implements Tokenizer {
  private readonly decoder = new TextDecoder("utf-8");

  constructor(
    readonly name: string,
    private readonly encoding: TiktokenEncoding,
  ) {}

  encode(text: string): number[] {
    return Array.from(this.encoding.encode(text));
  }

  decode(tokens: readonly number[]): string {
    return this.decoder.decode(this.encoding.decode(Uint32Array.from(tokens)));
  }

  // Byte-level BPE tokens can end inside a multi-byte character.
  charBoundaries(tokens: readonly number[]): boolean[] {
    const out: boolean[] = [true];
    let owed = 0;
    for (const token of tokens) {
      for (const byte of this.encoding.decode_single_token_bytes(token)) {
        if (byte >= 0x80 && byte < 0xc0) owed = Math.max(0, owed - 1);
        else owed = continuationsAfter(byte);
      }
      out.push(owed === 0);
    }
    return out;
  }
}

const tokenizerCache = new Map<string, Tokenizer>();

const MODEL_ENCODINGS: Array<[RegExp, "cl100k_base" | "o200k_base"]> = [
  [/^text-embedding-(3|ada-002)/, "cl100k_base"],
  [/^(gpt-4o|gpt-4\.1|o\d)/, "o200k_base"],
  [/^gpt-(4|3\.5)/, "cl100k_base"],
];

function encodingNameFor(model: string): "cl100k_base" | "o200k_base" | null {
  for (const [pattern, name] of MODEL_ENCODINGS) {
    if (pattern.test(model)) return name;
  }
  return null;
}

/**
 * Resolve the tokenizer for an embedding model. tiktoken is loaded lazily; if
 * it cannot be loaded or does not know the model, fall back to code points.
 */
export async function createTokenizer(model: string): Promise<Tokenizer> {
  const cached = tokenizerCache.get(model);
  if (cached) return cached;

  let tokenizer: Tokenizer = new CodePointTokenizer();
  const encodingName = encodingNameFor(model);
  if (encodingName) {
    try {
      const tiktoken = await import("tiktoken");
      tokenizer = new TiktokenTokenizer(encodingName, tiktoken.get_encoding(encodingName));
    } catch (err) {
      log.warn(`tokenizer: tiktoken unavailable for ${model}; counting code points (${String(err)})`);
    }
  } else {
    log.warn(`tokenizer: no known encoding for ${model}; counting code points`);
  }
  tokenizerCache.set(model, tokenizer);
  return tokenizer;
}
