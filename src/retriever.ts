import type { EmbeddingProvider } from "./embeddings.js";
import { describeError, EmbeddingError, ValidationError } from "./errors.js";
import { fields, log } from "./logger.js";
import type { CallContext, CollectionSummary, DocumentChunk, HealthReport, SearchHit } from "./types.js";
import { compareHits } from "./vector-index.js";
import type { VectorIndex } from "./vector-index.js";

export interface SearchOptions {
  topK?: number;
  minScore?: number;
  collections?: string[];
}

export const SEARCH_DEFAULTS = { topK: 8, minScore: 0, span: 2 } as const;
const TOP_K_MAX = 50;

export class KnowledgeRetriever {
  constructor(
    private readonly index: VectorIndex,
    private readonly embeddings: EmbeddingProvider,
  ) {}

  async search(query: string, options: SearchOptions = {}, ctx: CallContext = {}): Promise<SearchHit[]> {
    const topK = options.topK ?? SEARCH_DEFAULTS.topK;
    const minScore = options.minScore ?? SEARCH_DEFAULTS.minScore;
    if (!query.trim()) throw new ValidationError("query must not be empty");
    if (!Number.isInteger(topK) || topK < 1 || topK > TOP_K_MAX) {
      throw new ValidationError(`top_k must be an integer in [1, ${TOP_K_MAX}] (got ${topK})`);
    }
    if (!(minScore >= 0 && minScore <= 1)) {
      throw new ValidationError(`min_score must be in [0, 1] (got ${minScore})`);
    }

    const [vector] = await this.embeddings.embed([query], ctx.signal);
    if (!vector) throw new EmbeddingError("embedding provider returned no vector for the query");

    const hits = await this.index.query(vector, { topK, collections: options.collections });
    const results = hits.filter((h) => h.score >= minScore).sort(compareHits);
    log.debug(
      `search ${fields({ correlationId: ctx.correlationId, topK, minScore, collections: options.collections, results: results.length })}`,
    );
    return results;
  }

  /** Chunks in [center - span, center + span], clipped to the document. */
  async getSpan(documentId: string, centerChunkIndex: number, span: number = SEARCH_DEFAULTS.span): Promise<DocumentChunk[]> {
    if (!Number.isInteger(span) || span < 0) throw new ValidationError(`span must be >= 0 (got ${span})`);
    if (!Number.isInteger(centerChunkIndex) || centerChunkIndex < 0) {
      throw new ValidationError(`center_chunk_index must be >= 0 (got ${centerChunkIndex})`);
    }
    return this.index.getChunks(documentId, Math.max(0, centerChunkIndex - span), centerChunkIndex + span);
  }

  async listCollections(): Promise<CollectionSummary[]> {
    return this.index.listCollections();
  }

  async healthCheck(): Promise<HealthReport> {
    try {
      await this.index.ping();
      const { chunks, documents } = await this.index.count();
      const collections = await this.index.listCollections();
      const details = `${chunks} chunks indexed across ${documents} documents in ${collections.length} collections`;
      if (documents === 0 || collections.length === 0) return { status: "degraded", details };
      return { status: "ok", details };
    } catch (err) {
      return { status: "error", details: `index unreachable: ${describeError(err)}` };
    }
  }
}
