import path from "node:path";
import { readFile } from "node:fs/promises";
import type { BackoffJitter, MemoryScope, RuntimeConfig, SimilarityMetric } from "./types.js";
import { MEMORY_SCOPES } from "./types.js";
import { ConfigurationError } from "./errors.js";
import { log } from "./logger.js";

type Env = Record<string, string | undefined>;

const DEFAULT_INDEX_PATH = path.join(".", "data", "wargame-index.sqlite");

function resolveEnvVars(value: string, env: Env): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = env[envVar];
    if (!envValue) {
      throw new ConfigurationError(`Environment variable ${envVar} is not set`);
    }
    return envValue;
  });
}

function normalizeBaseUrl(value: string | undefined, name: string, source: "config" | "env"): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    log.warn(`ignoring invalid ${name} from ${source}: not a valid URL`);
    return undefined;
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    log.warn(`ignoring ${name} from ${source}: unsupported URL scheme (${parsed.protocol.replace(":", "")})`);
    return undefined;
  }

  return parsed.toString().replace(/\/+$/, "");
}

function stringOption(cfg: Record<string, unknown>, key: string, env: Env, envKey: string): string | undefined {
  const raw = cfg[key];
  if (typeof raw === "string" && raw.length > 0) return resolveEnvVars(raw, env);
  const fromEnv = env[envKey];
  return fromEnv && fromEnv.length > 0 ? fromEnv : undefined;
}

function numberOption(
  cfg: Record<string, unknown>,
  key: string,
  fallback: number,
  bounds: { min?: number; max?: number; integer?: boolean } = {},
): number {
  const raw = cfg[key];
  if (typeof raw !== "number" || !Number.isFinite(raw)) return fallback;
  if (bounds.integer && !Number.isInteger(raw)) {
    log.warn(`config ${key}=${raw} is not an integer; using ${fallback}`);
    return fallback;
  }
  if ((bounds.min !== undefined && raw < bounds.min) || (bounds.max !== undefined && raw > bounds.max)) {
    log.warn(`config ${key}=${raw} out of range; using ${fallback}`);
    return fallback;
  }
  return raw;
}

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (!raw) return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function isScope(value: unknown): value is MemoryScope {
  return typeof value === "string" && MEMORY_SCOPES.some((entry) => entry === value);
}

/**
 * Build a fully-populated RuntimeConfig from a loose object (config file, CLI
 * flags) with environment fallbacks. Every option is listed here with its
 * default; unknown keys are ignored and wrong-typed values fall back.
 */
export function parseConfig(raw: unknown, env: Env = process.env): RuntimeConfig {
  const cfg: Record<string, unknown> =
    raw && typeof raw === "object" && !Array.isArray(raw) ? { ...raw } : {};

  const envLimit = envNumber(env, "MEM0_DEFAULT_LIMIT");
  if (cfg.memoryDefaultLimit === undefined && envLimit !== undefined) cfg.memoryDefaultLimit = envLimit;

  const rawScope = cfg.memoryDefaultScope ?? env.MEM0_DEFAULT_SCOPE;
  const memoryDefaultScope: MemoryScope = isScope(rawScope) ? rawScope : "user";

  const similarityMetric: SimilarityMetric = cfg.similarityMetric === "dot" ? "dot" : "cosine";
  const retryJitter: BackoffJitter = cfg.retryJitter === "full" ? "full" : "none";

  const chunkMaxTokens = numberOption(cfg, "chunkMaxTokens", 800, { min: 1, integer: true });
  let chunkOverlapTokens = numberOption(cfg, "chunkOverlapTokens", 200, { min: 0, integer: true });
  if (chunkOverlapTokens >= chunkMaxTokens) {
    log.warn(`chunkOverlapTokens (${chunkOverlapTokens}) must be below chunkMaxTokens; using ${Math.floor(chunkMaxTokens / 4)}`);
    chunkOverlapTokens = Math.floor(chunkMaxTokens / 4);
  }

  const openaiBaseUrlRaw = stringOption(cfg, "openaiBaseUrl", env, "OPENAI_BASE_URL");
  const memoryBaseUrlRaw = stringOption(cfg, "memoryBaseUrl", env, "MEM0_BASE_URL");

  return {
    debug: cfg.debug === true || env.WARGAME_DEBUG === "1" || env.WARGAME_DEBUG === "true",
    openaiApiKey: stringOption(cfg, "openaiApiKey", env, "OPENAI_API_KEY"),
    openaiBaseUrl: normalizeBaseUrl(openaiBaseUrlRaw, "openaiBaseUrl", typeof cfg.openaiBaseUrl === "string" ? "config" : "env"),
    embeddingModel: stringOption(cfg, "embeddingModel", env, "EMBEDDING_MODEL") ?? "text-embedding-3-large",
    fakeEmbeddings: cfg.fakeEmbeddings === true,
    fakeEmbeddingDimensions: numberOption(cfg, "fakeEmbeddingDimensions", 256, { min: 8, integer: true }),
    embeddingBatchSize: numberOption(cfg, "embeddingBatchSize", 64, { min: 1, integer: true }),
    similarityMetric,
    indexPath: stringOption(cfg, "indexPath", env, "WARGAME_INDEX_PATH") ?? DEFAULT_INDEX_PATH,
    chunkMaxTokens,
    chunkOverlapTokens,
    ingestConcurrency: numberOption(cfg, "ingestConcurrency", 4, { min: 1, max: 64, integer: true }),
    memoryBaseUrl: normalizeBaseUrl(memoryBaseUrlRaw, "memoryBaseUrl", typeof cfg.memoryBaseUrl === "string" ? "config" : "env"),
    memoryApiKey: stringOption(cfg, "memoryApiKey", env, "MEM0_API_KEY"),
    memoryDefaultLimit: numberOption(cfg, "memoryDefaultLimit", 10, { min: 1, integer: true }),
    memoryDefaultScope,
    memoryRequestTimeoutMs: numberOption(cfg, "memoryRequestTimeoutMs", 10_000, { min: 1 }),
    memoryDedupThreshold: numberOption(cfg, "memoryDedupThreshold", 0.9, { min: 0, max: 1 }),
    memoryDailyQuota: numberOption(cfg, "memoryDailyQuota", 200, { min: 0, integer: true }),
    memoryMaxChars: numberOption(cfg, "memoryMaxChars", 2000, { min: 1, integer: true }),
    consolidationIntervalMs: numberOption(cfg, "consolidationIntervalMs", 60 * 60 * 1000, { min: 1000 }),
    consolidationTtlDays: numberOption(cfg, "consolidationTtlDays", 180, { min: 1 }),
    consolidationHalfLifeDays: numberOption(cfg, "consolidationHalfLifeDays", 30, { min: 1 }),
    consolidationMergeThreshold: numberOption(cfg, "consolidationMergeThreshold", 0.97, { min: 0, max: 1 }),
    consolidationMinImportance: numberOption(cfg, "consolidationMinImportance", 0.05, { min: 0, max: 1 }),
    consolidationScanLimit: numberOption(cfg, "consolidationScanLimit", 1000, { min: 1, integer: true }),
    maxToolIterations: numberOption(cfg, "maxToolIterations", 8, { min: 1, integer: true }),
    maxConsecutiveFailedTools: numberOption(cfg, "maxConsecutiveFailedTools", 3, { min: 1, integer: true }),
    circuitCooldownMs: numberOption(cfg, "circuitCooldownMs", 30_000, { min: 0 }),
    toolTimeoutMs: numberOption(cfg, "toolTimeoutMs", 15_000, { min: 1 }),
    sessionTimeoutMs: numberOption(cfg, "sessionTimeoutMs", 120_000, { min: 1 }),
    retryMaxRetries: numberOption(cfg, "retryMaxRetries", 3, { min: 0, integer: true }),
    retryBaseDelayMs: numberOption(cfg, "retryBaseDelayMs", 1000, { min: 0 }),
    retryMaxDelayMs: numberOption(cfg, "retryMaxDelayMs", 8000, { min: 0 }),
    retryJitter,
    agentModel: typeof cfg.agentModel === "string" && cfg.agentModel.length > 0 ? cfg.agentModel : "gpt-4.1-mini",
    agentTemperature: numberOption(cfg, "agentTemperature", 0.3, { min: 0, max: 2 }),
  };
}

/** Real embeddings need an API key unless fake mode is on. Fatal at startup only. */
export function assertEmbeddingConfig(config: RuntimeConfig): void {
  if (!config.fakeEmbeddings && !config.openaiApiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is required for real embeddings (or enable fakeEmbeddings)");
  }
}

export function assertMemoryConfig(config: RuntimeConfig): void {
  if (!config.memoryBaseUrl) {
    throw new ConfigurationError("MEM0_BASE_URL is not configured");
  }
}

/** Read a JSON config file; a missing path yields an empty object. */
export async function loadConfigFile(filePath: string | undefined): Promise<Record<string, unknown>> {
  if (!filePath) return {};
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`cannot read config file ${filePath}: ${String(err)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`config file ${filePath} is not valid JSON: ${String(err)}`);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigurationError(`config file ${filePath} must contain a JSON object`);
  }
  return { ...parsed };
}
