import PQueue from "p-queue";
import { segmentText } from "./chunking.js";
import { chunkIdFor, sha256Hex } from "./documents.js";
import { embedInBatches } from "./embeddings.js";
import type { EmbeddingProvider } from "./embeddings.js";
import { describeError, EmbeddingError, ExtractionError, WargameError } from "./errors.js";
import { ExtractorRegistry, iterDocuments } from "./extractors.js";
import { fields, log } from "./logger.js";
import { MetadataResolver } from "./metadata.js";
import type { Tokenizer } from "./tokenizer.js";
import type { BatchFailure, BatchReport, MetadataWarning } from "./types.js";
import type { IndexedChunk, VectorIndex } from "./vector-index.js";

export interface IngestorSettings {
  chunkMaxTokens: number;
  chunkOverlapTokens: number;
  embeddingBatchSize: number;
  ingestConcurrency: number;
}

export interface IngestOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

interface DocumentOutcome {
  path: string;
  ok: boolean;
  reason?: string;
  chunkCount: number;
  tokenCount: number;
  warnings: MetadataWarning[];
}

/**
 * Extract, segment, resolve metadata, embed and index each document. Every
 * document runs in isolation: a failure is recorded and the batch goes on.
 */
export class DocumentIngestor {
  constructor(
    private readonly index: VectorIndex,
    private readonly embeddings: EmbeddingProvider,
    private readonly tokenizer: Tokenizer,
    private readonly settings: IngestorSettings,
    private readonly extractors: ExtractorRegistry = new ExtractorRegistry(),
    private readonly metadata: MetadataResolver = new MetadataResolver(),
  ) {}

  async ingestDirectory(dir: string, options: IngestOptions = {}): Promise<BatchReport> {
    const paths = await iterDocuments(dir, this.extractors);
    log.info(`ingest: found ${paths.length} document(s) under ${dir}`);
    return this.ingest(paths, options);
  }

  async ingest(paths: string[], options: IngestOptions = {}): Promise<BatchReport> {
    const startedAt = new Date().toISOString();
    const concurrency = Math.max(1, options.concurrency ?? this.settings.ingestConcurrency);
    const queue = new PQueue({ concurrency });
    const outcomes = new Array<DocumentOutcome | undefined>(paths.length);

    paths.forEach((p, i) => {
      void queue.add(async () => {
        outcomes[i] = await this.ingestIsolated(p, options.signal);
      });
    });
    await queue.onIdle();

    const succeeded: string[] = [];
    const failed: BatchFailure[] = [];
    const warnings: BatchReport["warnings"] = [];
    let chunkCount = 0;
    let tokenCount = 0;
    outcomes.forEach((o, i) => {
      const p = paths[i] ?? "";
      if (!o) {
        failed.push({ path: p, reason: "not processed" });
        return;
      }
      for (const w of o.warnings) warnings.push({ ...w, path: o.path });
      if (o.ok) {
        succeeded.push(o.path);
        chunkCount += o.chunkCount;
        tokenCount += o.tokenCount;
      } else {
        failed.push({ path: o.path, reason: o.reason ?? "unknown error" });
      }
    });

    const report: BatchReport = {
      succeeded,
      failed,
      warnings,
      documentCount: succeeded.length,
      chunkCount,
      tokenCount,
      startedAt,
      finishedAt: new Date().toISOString(),
    };
    log.info(
      `ingest.complete ${fields({
        documents: report.documentCount,
        failed: failed.length,
        chunks: chunkCount,
        tokens: tokenCount,
        warnings: warnings.length,
      })}`,
    );
    return report;
  }

  private async ingestIsolated(sourcePath: string, signal?: AbortSignal): Promise<DocumentOutcome> {
    try {
      if (signal?.aborted) throw new ExtractionError("ingestion cancelled");
      return await this.ingestOne(sourcePath, signal);
    } catch (err) {
      const reason = describeError(err);
      log.warn(`ingest.failed ${fields({ path: sourcePath })}: ${reason}`);
      return { path: sourcePath, ok: false, reason, chunkCount: 0, tokenCount: 0, warnings: [] };
    }
  }

  private async ingestOne(sourcePath: string, signal?: AbortSignal): Promise<DocumentOutcome> {
    const extracted = await this.extractors.extract(sourcePath);
    const { chunks, tokenCount } = segmentText(extracted.text, this.tokenizer, {
      maxTokens: this.settings.chunkMaxTokens,
      overlapTokens: this.settings.chunkOverlapTokens,
    });
    const resolved = await this.metadata.resolve(sourcePath, extracted.embedded, sha256Hex(extracted.text));

    if (chunks.length === 0) {
      const removed = await this.index.deleteBySource(sourcePath);
      if (removed > 0) log.info(`ingest: removed ${removed} stale chunk(s) for ${sourcePath}`);
      return {
        path: sourcePath,
        ok: false,
        reason: "no extractable text",
        chunkCount: 0,
        tokenCount: 0,
        warnings: resolved.warnings,
      };
    }

    let vectors: number[][];
    try {
      vectors = await embedInBatches(
        this.embeddings,
        chunks.map((c) => c.text),
        this.settings.embeddingBatchSize,
        signal,
      );
    } catch (err) {
      if (err instanceof WargameError) throw err;
      throw new EmbeddingError(`embedding failed for ${sourcePath}: ${String(err)}`, { cause: err });
    }

    const { metadata } = resolved;
    const ocr = resolved.ocr || extracted.ocr;
    const indexed: IndexedChunk[] = chunks.map((c, i) => ({
      chunkId: chunkIdFor(metadata.documentId, c.index),
      documentId: metadata.documentId,
      chunkIndex: c.index,
      chunkCount: chunks.length,
      text: c.text,
      ocr,
      metadata,
      vector: vectors[i] ?? [],
    }));
    await this.index.replaceDocument(metadata.documentId, sourcePath, indexed);

    log.debug(
      `ingest.document ${fields({ path: sourcePath, documentId: metadata.documentId, chunks: chunks.length, tokens: tokenCount })}`,
    );
    return {
      path: sourcePath,
      ok: true,
      chunkCount: chunks.length,
      tokenCount,
      warnings: resolved.warnings,
    };
  }
}
