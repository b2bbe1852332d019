import path from "node:path";
import { mkdirSync } from "node:fs";
import Database from "better-sqlite3";
import { COLLECTION_DESCRIPTIONS, isCollection, isDoctrine } from "./documents.js";
import { similarity } from "./embeddings.js";
import { IndexUpsertError } from "./errors.js";
import { INDEX_SCHEMA_VERSION, INDEX_TABLES_SQL } from "./index-schema.js";
import { StoredChunkMetadataSchema, VectorSchema } from "./schemas.js";
import type { CollectionSummary, DocumentChunk, DocumentMetadata, SearchHit, SimilarityMetric } from "./types.js";

export interface IndexedChunk extends DocumentChunk {
  vector: number[];
}

export interface IndexQuery {
  topK: number;
  collections?: readonly string[];
}

/** Storage contract the retriever and ingestor depend on. */
export interface VectorIndex {
  /** Atomically replace every chunk of `documentId` (and any earlier chunks of `sourcePath`). */
  replaceDocument(documentId: string, sourcePath: string, chunks: IndexedChunk[]): Promise<void>;
  deleteBySource(sourcePath: string): Promise<number>;
  query(vector: readonly number[], query: IndexQuery): Promise<SearchHit[]>;
  /** Chunks of one document with `from <= chunk_index <= to`, ascending. */
  getChunks(documentId: string, from: number, to: number): Promise<DocumentChunk[]>;
  listCollections(): Promise<CollectionSummary[]>;
  count(): Promise<{ chunks: number; documents: number }>;
  ping(): Promise<void>;
  close(): void;
}

interface ChunkRow {
  chunk_id: string;
  document_id: string;
  chunk_index: number;
  chunk_count: number;
  text: string;
  ocr: number;
  metadata: string;
  vector: string;
}

const ROW_COLUMNS = "chunk_id, document_id, chunk_index, chunk_count, text, ocr, metadata, vector";

/** Brute-force similarity index over a single SQLite table. */
export class SqliteVectorIndex implements VectorIndex {
  private readonly db: Database.Database;

  constructor(
    dbPath: string,
    private readonly metric: SimilarityMetric = "cosine",
  ) {
    if (dbPath !== ":memory:") mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    this.db = new Database(dbPath);
    this.db.exec("PRAGMA journal_mode=WAL;");
    this.db.exec(INDEX_TABLES_SQL);
    this.db
      .prepare("INSERT OR IGNORE INTO meta(key, value) VALUES (?, ?)")
      .run("schemaVersion", String(INDEX_SCHEMA_VERSION));
    const version = this.db.prepare<[string], { value: string }>("SELECT value FROM meta WHERE key = ?").get("schemaVersion");
    if (version?.value !== String(INDEX_SCHEMA_VERSION)) {
      this.db.close();
      throw new IndexUpsertError(`unsupported index schemaVersion: ${version?.value ?? "missing"}`);
    }
  }

  async replaceDocument(documentId: string, sourcePath: string, chunks: IndexedChunk[]): Promise<void> {
    const deleteDoc = this.db.prepare("DELETE FROM chunks WHERE document_id = ? OR source_path = ?");
    const insert = this.db.prepare(
      `INSERT INTO chunks(chunk_id, document_id, chunk_index, chunk_count, source_path, collection, text, ocr, metadata, vector)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const tx = this.db.transaction((rows: IndexedChunk[]) => {
      deleteDoc.run(documentId, sourcePath);
      for (const c of rows) {
        insert.run(
          c.chunkId,
          c.documentId,
          c.chunkIndex,
          c.chunkCount,
          sourcePath,
          c.metadata.collection,
          c.text,
          c.ocr ? 1 : 0,
          JSON.stringify(storedMetadata(c.metadata)),
          JSON.stringify(c.vector),
        );
      }
    });
    try {
      tx(chunks);
    } catch (err) {
      throw new IndexUpsertError(`failed to replace ${documentId}: ${String(err)}`, { cause: err });
    }
  }

  async deleteBySource(sourcePath: string): Promise<number> {
    return this.db.prepare("DELETE FROM chunks WHERE source_path = ?").run(sourcePath).changes;
  }

  async query(vector: readonly number[], query: IndexQuery): Promise<SearchHit[]> {
    const collections = query.collections ?? [];
    const rows =
      collections.length > 0
        ? this.db
            .prepare<string[], ChunkRow>(
              `SELECT ${ROW_COLUMNS} FROM chunks WHERE collection IN (${collections.map(() => "?").join(", ")})`,
            )
            .all(...collections)
        : this.db.prepare<[], ChunkRow>(`SELECT ${ROW_COLUMNS} FROM chunks`).all();

    return rows
      .map((row) => {
        const chunk = toChunk(row);
        return {
          chunkId: chunk.chunkId,
          documentId: chunk.documentId,
          chunkIndex: chunk.chunkIndex,
          chunkCount: chunk.chunkCount,
          text: chunk.text,
          score: similarity(this.metric, vector, VectorSchema.parse(JSON.parse(row.vector))),
          metadata: chunk.metadata,
        };
      })
      .sort(compareHits)
      .slice(0, Math.max(0, query.topK));
  }

  async getChunks(documentId: string, from: number, to: number): Promise<DocumentChunk[]> {
    return this.db
      .prepare<[string, number, number], ChunkRow>(
        `SELECT ${ROW_COLUMNS} FROM chunks WHERE document_id = ? AND chunk_index BETWEEN ? AND ? ORDER BY chunk_index`,
      )
      .all(documentId, from, to)
      .map(toChunk);
  }

  async listCollections(): Promise<CollectionSummary[]> {
    const rows = this.db
      .prepare<[], { collection: string; documents: number }>(
        "SELECT collection, COUNT(DISTINCT document_id) AS documents FROM chunks GROUP BY collection ORDER BY collection",
      )
      .all();
    return rows.map((r) => ({
      name: r.collection,
      documentCount: r.documents,
      description: isCollection(r.collection) ? COLLECTION_DESCRIPTIONS[r.collection] : "",
    }));
  }

  async count(): Promise<{ chunks: number; documents: number }> {
    const row = this.db
      .prepare<[], { chunks: number; documents: number }>(
        "SELECT COUNT(*) AS chunks, COUNT(DISTINCT document_id) AS documents FROM chunks",
      )
      .get();
    return { chunks: row?.chunks ?? 0, documents: row?.documents ?? 0 };
  }

  async ping(): Promise<void> {
    this.db.prepare("SELECT 1").get();
  }

  close(): void {
    this.db.close();
  }
}

/** Score descending, then chunk index and document id ascending. */
export function compareHits(a: SearchHit, b: SearchHit): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.chunkIndex !== b.chunkIndex) return a.chunkIndex - b.chunkIndex;
  return a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0;
}

function storedMetadata(m: DocumentMetadata) {
  return {
    document_id: m.documentId,
    source: m.sourcePath,
    collection: m.collection,
    title: m.title,
    year: m.year,
    doctrine: m.doctrine,
    tags: m.tags,
  };
}

function toChunk(row: ChunkRow): DocumentChunk {
  const stored = StoredChunkMetadataSchema.parse(JSON.parse(row.metadata));
  return {
    chunkId: row.chunk_id,
    documentId: row.document_id,
    chunkIndex: row.chunk_index,
    chunkCount: row.chunk_count,
    text: row.text,
    ocr: row.ocr === 1,
    metadata: {
      documentId: stored.document_id,
      sourcePath: stored.source,
      collection: isCollection(stored.collection) ? stored.collection : "other",
      title: stored.title,
      year: stored.year,
      doctrine: isDoctrine(stored.doctrine) ? stored.doctrine : null,
      tags: stored.tags,
    },
  };
}
