export const COLLECTIONS = ["doctrine", "aar", "scenario", "intel", "other"] as const;
export type CollectionName = (typeof COLLECTIONS)[number];

export const DOCTRINES = ["joint", "land", "maritime", "air", "cyber", "space", "logistics", "other"] as const;
export type DoctrineName = (typeof DOCTRINES)[number];

export const MEMORY_SCOPES = ["user", "scenario", "agent"] as const;
export type MemoryScope = (typeof MEMORY_SCOPES)[number];

export type SimilarityMetric = "cosine" | "dot";
export type BackoffJitter = "none" | "full";

export const YEAR_MIN = 1900;
export const YEAR_MAX = 2100;

export interface RuntimeConfig {
  debug: boolean;
  // Embeddings
  openaiApiKey: string | undefined;
  openaiBaseUrl: string | undefined;
  embeddingModel: string;
  fakeEmbeddings: boolean;
  fakeEmbeddingDimensions: number;
  embeddingBatchSize: number;
  similarityMetric: SimilarityMetric;
  // Index & ingestion
  indexPath: string;
  chunkMaxTokens: number;
  chunkOverlapTokens: number;
  ingestConcurrency: number;
  // Memory backend
  memoryBaseUrl: string | undefined;
  memoryApiKey: string | undefined;
  memoryDefaultLimit: number;
  memoryDefaultScope: MemoryScope;
  memoryRequestTimeoutMs: number;
  memoryDedupThreshold: number;
  memoryDailyQuota: number;
  memoryMaxChars: number;
  // Consolidation
  consolidationIntervalMs: number;
  consolidationTtlDays: number;
  consolidationHalfLifeDays: number;
  consolidationMergeThreshold: number;
  consolidationMinImportance: number;
  consolidationScanLimit: number;
  // Orchestration
  maxToolIterations: number;
  maxConsecutiveFailedTools: number;
  circuitCooldownMs: number;
  toolTimeoutMs: number;
  sessionTimeoutMs: number;
  retryMaxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  retryJitter: BackoffJitter;
  // Agent model
  agentModel: string;
  agentTemperature: number;
}

/** Per-call context threaded from the tool surface down to the index and memory backend. */
export interface CallContext {
  correlationId?: string;
  signal?: AbortSignal;
}

export interface DocumentMetadata {
  documentId: string;
  sourcePath: string;
  collection: CollectionName;
  title: string;
  year: number | null;
  doctrine: DoctrineName | null;
  tags: string[];
}

export interface DocumentChunk {
  chunkId: string;
  documentId: string;
  chunkIndex: number;
  chunkCount: number;
  text: string;
  /** True when the text came from OCR rather than an embedded text layer. */
  ocr: boolean;
  metadata: DocumentMetadata;
}

export interface SearchHit {
  chunkId: string;
  documentId: string;
  chunkIndex: number;
  chunkCount: number;
  text: string;
  /** Similarity in [0, 1]; higher is closer. */
  score: number;
  metadata: DocumentMetadata;
}

export interface CollectionSummary {
  name: string;
  documentCount: number;
  description: string;
}

export type HealthStatus = "ok" | "degraded" | "error";

export interface HealthReport {
  status: HealthStatus;
  details: string;
}

export interface MetadataWarning {
  field: "year" | "collection" | "doctrine" | "sidecar" | "embedded";
  value: unknown;
  source: MetadataSource;
  message: string;
}

export type MetadataSource = "sidecar" | "embedded" | "filename" | "default";

export interface BatchFailure {
  path: string;
  reason: string;
}

export interface BatchReport {
  succeeded: string[];
  failed: BatchFailure[];
  warnings: Array<MetadataWarning & { path: string }>;
  documentCount: number;
  chunkCount: number;
  tokenCount: number;
  startedAt: string;
  finishedAt: string;
}

export interface MemoryRecord {
  memoryId: string;
  userId: string;
  scope: MemoryScope;
  memory: string;
  tags: string[];
  source: string | null;
  importance: number;
  createdAt: string;
  /** When `importance` was last decayed; decay runs from here, else from `createdAt`. */
  decayedAt?: string;
  /** Present on search results only. */
  score?: number;
}

export type MemoryAddStatus = "created" | "deduplicated" | "rejected_quota";

export interface MemoryAddResult {
  memoryId: string | null;
  status: MemoryAddStatus;
  reason?: "daily_quota" | "too_long";
}

export type MemoryDeleteStatus = "deleted" | "not_found";

export interface ConsolidationReport {
  scanned: number;
  decayed: number;
  evicted: number;
  merged: number;
}
