import { OpenAiAgentPolicy, openAiModelClient } from "./agent/openai-policy.js";
import { ToolOrchestrator } from "./agent/orchestrator.js";
import type { OrchestratorOptions } from "./agent/orchestrator.js";
import type { AgentPolicy } from "./agent/policy.js";
import { buildEmbeddingProvider } from "./embeddings.js";
import type { EmbeddingProvider } from "./embeddings.js";
import { DocumentIngestor } from "./ingest.js";
import { ConfigurationError } from "./errors.js";
import { fields, log } from "./logger.js";
import { HttpMemoryBackend } from "./memory/client.js";
import type { MemoryBackend } from "./memory/client.js";
import { MemoryConsolidator } from "./memory/consolidation.js";
import { MemoryGateway } from "./memory/gateway.js";
import { CircuitBreakerRegistry } from "./resilience/circuit-breaker.js";
import { RetryPolicy } from "./resilience/retry.js";
import type { Sleep } from "./resilience/retry.js";
import { KnowledgeRetriever } from "./retriever.js";
import { createTokenizer } from "./tokenizer.js";
import type { Tokenizer } from "./tokenizer.js";
import { buildToolRegistry } from "./tools/definitions.js";
import type { ToolRegistry } from "./tools/registry.js";
import type { RuntimeConfig } from "./types.js";
import { SqliteVectorIndex } from "./vector-index.js";
import type { VectorIndex } from "./vector-index.js";
import OpenAI from "openai";

export interface RuntimeOverrides {
  embeddings?: EmbeddingProvider;
  index?: VectorIndex;
  tokenizer?: Tokenizer;
  /** `null` disables memory even when a base URL is configured. */
  memoryBackend?: MemoryBackend | null;
  clock?: () => number;
  sleep?: Sleep;
}

export interface Runtime {
  config: RuntimeConfig;
  tokenizer: Tokenizer;
  embeddings: EmbeddingProvider;
  index: VectorIndex;
  retriever: KnowledgeRetriever;
  ingestor: DocumentIngestor;
  memory: MemoryGateway | null;
  tools: ToolRegistry;
  breakers: CircuitBreakerRegistry;
  retry: RetryPolicy;
  orchestrator(policy: AgentPolicy, opts?: Partial<OrchestratorOptions>): ToolOrchestrator;
  /** Needs an OpenAI API key; `model` overrides `agentModel`. */
  openAiPolicy(model?: string): OpenAiAgentPolicy;
  close(): void;
}

/**
 * Wire every component from one validated config. Callers own the returned
 * runtime and must `close()` it.
 */
export async function createRuntime(config: RuntimeConfig, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const clock = overrides.clock ?? Date.now;
  const embeddings = overrides.embeddings ?? buildEmbeddingProvider(config);
  const tokenizer = overrides.tokenizer ?? (await createTokenizer(config.embeddingModel));
  const index = overrides.index ?? new SqliteVectorIndex(config.indexPath, config.similarityMetric);

  const retriever = new KnowledgeRetriever(index, embeddings);
  const ingestor = new DocumentIngestor(index, embeddings, tokenizer, {
    chunkMaxTokens: config.chunkMaxTokens,
    chunkOverlapTokens: config.chunkOverlapTokens,
    embeddingBatchSize: config.embeddingBatchSize,
    ingestConcurrency: config.ingestConcurrency,
  });

  const backend =
    overrides.memoryBackend !== undefined
      ? overrides.memoryBackend
      : config.memoryBaseUrl
        ? new HttpMemoryBackend({
            baseUrl: config.memoryBaseUrl,
            apiKey: config.memoryApiKey,
            timeoutMs: config.memoryRequestTimeoutMs,
          })
        : null;
  const memory = backend
    ? new MemoryGateway(
        backend,
        {
          dedupThreshold: config.memoryDedupThreshold,
          maxChars: config.memoryMaxChars,
          dailyQuota: config.memoryDailyQuota,
          defaultLimit: config.memoryDefaultLimit,
          defaultScope: config.memoryDefaultScope,
        },
        new MemoryConsolidator(
          backend,
          embeddings,
          {
            ttlDays: config.consolidationTtlDays,
            halfLifeDays: config.consolidationHalfLifeDays,
            mergeThreshold: config.consolidationMergeThreshold,
            minImportance: config.consolidationMinImportance,
            scanLimit: config.consolidationScanLimit,
            similarityMetric: config.similarityMetric,
          },
          clock,
        ),
        clock,
      )
    : null;
  if (!memory) log.info("memory backend not configured; memory tools will report unavailable");

  const tools = buildToolRegistry({ retriever, memory });
  const breakers = new CircuitBreakerRegistry({
    failureThreshold: config.maxConsecutiveFailedTools,
    cooldownMs: config.circuitCooldownMs,
    clock,
  });
  const retry = new RetryPolicy({
    maxRetries: config.retryMaxRetries,
    baseDelayMs: config.retryBaseDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
    jitter: config.retryJitter,
  });

  log.debug(
    `runtime ${fields({
      embeddings: embeddings.model,
      tokenizer: tokenizer.name,
      index: config.indexPath,
      memory: memory ? "on" : "off",
      tools: tools.list().length,
    })}`,
  );

  return {
    config,
    tokenizer,
    embeddings,
    index,
    retriever,
    ingestor,
    memory,
    tools,
    breakers,
    retry,
    orchestrator(policy, opts = {}) {
      return new ToolOrchestrator(tools, policy, {
        maxToolIterations: config.maxToolIterations,
        toolTimeoutMs: config.toolTimeoutMs,
        sessionTimeoutMs: config.sessionTimeoutMs,
        retry,
        breakers,
        sleep: overrides.sleep,
        ...opts,
      });
    },
    openAiPolicy(model) {
      if (!config.openaiApiKey) throw new ConfigurationError("OPENAI_API_KEY is required for the OpenAI agent policy");
      const client = new OpenAI({ apiKey: config.openaiApiKey, baseURL: config.openaiBaseUrl });
      return new OpenAiAgentPolicy(openAiModelClient(client), tools, {
        model: model ?? config.agentModel,
        temperature: config.agentTemperature,
      });
    },
    close() {
      memory?.stopConsolidation();
      index.close();
    },
  };
}

export { parseConfig, loadConfigFile } from "./config.js";
export { segment, segmentText } from "./chunking.js";
export { MetadataResolver } from "./metadata.js";
export { FakeEmbeddingProvider, OpenAiEmbeddingProvider } from "./embeddings.js";
export { SqliteVectorIndex } from "./vector-index.js";
export { DocumentIngestor } from "./ingest.js";
export { KnowledgeRetriever } from "./retriever.js";
export { MemoryGateway } from "./memory/gateway.js";
export { HttpMemoryBackend } from "./memory/client.js";
export { ToolOrchestrator } from "./agent/orchestrator.js";
export { MemoryFirstPolicy } from "./agent/policy.js";
export { OpenAiAgentPolicy } from "./agent/openai-policy.js";
export { RetryPolicy } from "./resilience/retry.js";
export { CircuitBreakerRegistry } from "./resilience/circuit-breaker.js";
export * from "./errors.js";
export type * from "./types.js";
export type { SessionResult } from "./agent/session.js";
