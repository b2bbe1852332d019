import path from "node:path";
import { createRequire } from "node:module";
import { readdir, readFile } from "node:fs/promises";
import { ExtractionError } from "./errors.js";
import { PdfParseResultSchema } from "./schemas.js";

export interface ExtractedText {
  text: string;
  /** Metadata the file format carries itself (front matter, PDF info dictionary). */
  embedded: Record<string, unknown>;
  ocr: boolean;
}

/** Turns one file into raw text. Failures are per file. */
export interface TextExtractor {
  readonly extensions: readonly string[];
  extract(filePath: string): Promise<ExtractedText>;
}

async function readUtf8(filePath: string): Promise<string> {
  try {
    const raw = await readFile(filePath, "utf-8");
    return raw.replace(/\r\n/g, "\n");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? String(err.code) : "";
    if (code === "ENOENT") throw new ExtractionError(`File not found: ${filePath}`, { cause: err });
    if (code === "EACCES") throw new ExtractionError(`Permission denied: ${filePath}`, { cause: err });
    throw new ExtractionError(`Failed to read ${filePath}: ${String(err)}`, { cause: err });
  }
}

/**
 * Split a leading `---` front matter block off markdown. Values are kept as
 * raw strings; `parseSimpleYaml` coerces them.
 */
export function splitFrontMatter(raw: string): { frontMatter: string | null; body: string } {
  const match = raw.match(/^---\n([\s\S]*?)\n---\n?([\s\S]*)$/);
  if (!match) return { frontMatter: null, body: raw };
  return { frontMatter: match[1] ?? "", body: match[2] ?? "" };
}

/**
 * Parse the flat YAML subset used by sidecar files and front matter:
 * `key: value`, inline `[a, b]` lists and `- item` block lists.
 */
export function parseSimpleYaml(text: string): Record<string, unknown> {
  const data: Record<string, unknown> = {};
  let currentList: string[] | null = null;

  for (const line of text.split("\n")) {
    const stripped = line.trim();
    if (!stripped || stripped.startsWith("#")) continue;
    if (stripped.startsWith("- ") && currentList) {
      currentList.push(unquote(stripped.slice(2).trim()));
      continue;
    }
    const colonIdx = line.indexOf(":");
    if (colonIdx === -1) continue;
    const key = line.slice(0, colonIdx).trim();
    const value = line.slice(colonIdx + 1).trim();
    if (!value) {
      currentList = [];
      data[key] = currentList;
      continue;
    }
    currentList = null;
    const inline = value.match(/^\[(.*)]$/);
    data[key] = inline
      ? (inline[1] ?? "").split(",").map((v) => unquote(v.trim())).filter(Boolean)
      : coerceScalar(value);
  }
  return data;
}

function unquote(value: string): string {
  return value.replace(/^["']|["']$/g, "");
}

function coerceScalar(value: string): unknown {
  const lowered = value.toLowerCase();
  if (lowered === "null" || lowered === "none" || lowered === "~") return null;
  if (lowered === "true" || lowered === "false") return lowered === "true";
  if (/^-?\d+$/.test(value)) return Number(value);
  return unquote(value);
}

export const plainTextExtractor: TextExtractor = {
  extensions: [".txt", ".text"],
  async extract(filePath) {
    return { text: await readUtf8(filePath), embedded: {}, ocr: false };
  },
};

export const markdownExtractor: TextExtractor = {
  extensions: [".md", ".markdown"],
  async extract(filePath) {
    const raw = await readUtf8(filePath);
    const { frontMatter, body } = splitFrontMatter(raw);
    return {
      text: body,
      embedded: frontMatter === null ? {} : parseSimpleYaml(frontMatter),
      ocr: false,
    };
  },
};

const requireCjs = createRequire(import.meta.url);

/** PDF text layer via pdf-parse. The library entry is loaded lazily. */
export const pdfExtractor: TextExtractor = {
  extensions: [".pdf"],
  async extract(filePath) {
    let data: Buffer;
    try {
      data = await readFile(filePath);
    } catch (err) {
      throw new ExtractionError(`Failed to read ${filePath}: ${String(err)}`, { cause: err });
    }
    // The package index runs a self-test when loaded without a parent module; load the library file directly.
    const loaded: unknown = requireCjs("pdf-parse/lib/pdf-parse.js");
    if (typeof loaded !== "function") {
      throw new ExtractionError("pdf-parse did not load");
    }
    let result: unknown;
    try {
      result = await loaded(data);
    } catch (err) {
      throw new ExtractionError(`Failed to parse PDF ${filePath}: ${String(err)}`, { cause: err });
    }
    const parsed = PdfParseResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new ExtractionError(`Unexpected pdf-parse output for ${filePath}`);
    }
    const info = parsed.data.info ?? {};
    const embedded: Record<string, unknown> = {};
    if (typeof info.Title === "string" && info.Title.trim()) embedded.title = info.Title.trim();
    if (typeof info.CreationDate === "string") {
      const year = info.CreationDate.match(/^D:(\d{4})/);
      if (year?.[1]) embedded.year = Number(year[1]);
    }
    return { text: parsed.data.text, embedded, ocr: false };
  },
};

/** Word documents via mammoth's raw-text conversion; styling and images are dropped. */
export const docxExtractor: TextExtractor = {
  extensions: [".docx"],
  async extract(filePath) {
    const { default: mammoth } = await import("mammoth");
    try {
      const result = await mammoth.extractRawText({ path: filePath });
      return { text: result.value.replace(/\r\n/g, "\n"), embedded: {}, ocr: false };
    } catch (err) {
      throw new ExtractionError(`Failed to read DOCX ${filePath}: ${String(err)}`, { cause: err });
    }
  },
};

export class ExtractorRegistry {
  private readonly byExtension = new Map<string, TextExtractor>();

  constructor(extractors: TextExtractor[] = [plainTextExtractor, markdownExtractor, pdfExtractor, docxExtractor]) {
    for (const extractor of extractors) this.register(extractor);
  }

  register(extractor: TextExtractor): void {
    for (const ext of extractor.extensions) this.byExtension.set(ext.toLowerCase(), extractor);
  }

  supports(filePath: string): boolean {
    return this.byExtension.has(path.extname(filePath).toLowerCase());
  }

  async extract(filePath: string): Promise<ExtractedText> {
    const ext = path.extname(filePath).toLowerCase();
    const extractor = this.byExtension.get(ext);
    if (!extractor) {
      throw new ExtractionError(`Unsupported file type: ${ext || "(none)"} (${filePath})`);
    }
    return extractor.extract(filePath);
  }
}

/** Walk `dir` recursively and return supported files in sorted order. Sidecars are skipped. */
export async function iterDocuments(dir: string, registry: ExtractorRegistry): Promise<string[]> {
  const out: string[] = [];
  const walk = async (current: string): Promise<void> => {
    const entries = await readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else if (entry.isFile() && !/\.meta\.(ya?ml|json)$/i.test(entry.name) && registry.supports(full)) {
        out.push(full);
      }
    }
  };
  await walk(dir);
  return out.sort();
}
