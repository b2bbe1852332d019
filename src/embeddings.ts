import OpenAI from "openai";
import { assertEmbeddingConfig } from "./config.js";
import { sha256Hex } from "./documents.js";
import { EmbeddingError } from "./errors.js";
import { log } from "./logger.js";
import type { RuntimeConfig, SimilarityMetric } from "./types.js";

export interface EmbeddingProvider {
  readonly model: string;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/**
 * Deterministic offline embeddings: the sha256 digest of the text, repeated
 * to `dimensions` bytes, each scaled to [0, 1]. Same text, same vector.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model = "fake-sha256";

  constructor(private readonly dimensions = 256) {}

  vectorFor(text: string): number[] {
    const digest = Buffer.from(sha256Hex(text), "hex");
    const out = new Array<number>(this.dimensions);
    for (let i = 0; i < this.dimensions; i++) {
      out[i] = (digest[i % digest.length] ?? 0) / 255;
    }
    return out;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.vectorFor(t));
  }
}

/** The slice of the OpenAI SDK's `embeddings` resource the provider calls. */
export interface EmbeddingsApi {
  create(
    body: { model: string; input: string[] },
    options?: { signal?: AbortSignal },
  ): Promise<{ data: Array<{ index: number; embedding: number[] }> }>;
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  private readonly api: EmbeddingsApi;

  constructor(
    readonly model: string,
    opts: { apiKey: string; baseURL?: string; api?: EmbeddingsApi },
  ) {
    this.api = opts.api ?? new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL }).embeddings;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const response = await this.api.create({ model: this.model, input: texts }, { signal });
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== texts.length) {
        throw new EmbeddingError(`expected ${texts.length} embeddings, got ${ordered.length}`);
      }
      return ordered.map((d) => d.embedding);
    } catch (err) {
      if (err instanceof EmbeddingError) throw err;
      throw new EmbeddingError(`embedding request failed (${this.model}): ${String(err)}`, { cause: err });
    }
  }
}

/** Fake provider when asked for; otherwise OpenAI, which needs an API key. */
export function buildEmbeddingProvider(config: RuntimeConfig): EmbeddingProvider {
  if (config.fakeEmbeddings) {
    log.debug(`embeddings: deterministic fake provider (${config.fakeEmbeddingDimensions} dims)`);
    return new FakeEmbeddingProvider(config.fakeEmbeddingDimensions);
  }
  assertEmbeddingConfig(config);
  return new OpenAiEmbeddingProvider(config.embeddingModel, {
    apiKey: config.openaiApiKey ?? "",
    baseURL: config.openaiBaseUrl,
  });
}

/**
 * Embed `texts` in batches of `batchSize`, batches issued concurrently.
 * Output order matches input order.
 */
export async function embedInBatches(
  provider: EmbeddingProvider,
  texts: string[],
  batchSize: number,
  signal?: AbortSignal,
): Promise<number[][]> {
  const size = Math.max(1, batchSize);
  const batches: string[][] = [];
  for (let i = 0; i < texts.length; i += size) batches.push(texts.slice(i, i + size));
  const results = await Promise.all(batches.map((b) => provider.embed(b, signal)));
  const flat = results.flat();
  if (flat.length !== texts.length) {
    throw new EmbeddingError(`expected ${texts.length} embeddings, got ${flat.length}`);
  }
  return flat;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  if (n === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;
  return dot / denom;
}

export function dotProduct(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  for (let i = 0; i < n; i++) dot += (a[i] ?? 0) * (b[i] ?? 0);
  return dot;
}

/** Similarity clamped to [0, 1] so scores compare against thresholds in that range. */
export function similarity(metric: SimilarityMetric, a: readonly number[], b: readonly number[]): number {
  const raw = metric === "dot" ? dotProduct(a, b) : cosineSimilarity(a, b);
  if (!Number.isFinite(raw)) return 0;
  return Math.min(1, Math.max(0, raw));
}
