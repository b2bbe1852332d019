import { Type } from "@sinclair/typebox";
import { ToolInvocationError } from "../errors.js";
import type { MemoryGateway } from "../memory/gateway.js";
import type { KnowledgeRetriever } from "../retriever.js";
import type { DocumentChunk, DocumentMetadata, MemoryRecord } from "../types.js";
import { ToolRegistry } from "./registry.js";

const CorrelationId = Type.Optional(
  Type.String({ description: "Optional id threaded through to the index and memory backend for tracing." }),
);

const Scope = Type.Union([Type.Literal("user"), Type.Literal("scenario"), Type.Literal("agent")]);

export function metadataPayload(m: DocumentMetadata, chunk?: { chunkIndex: number; chunkCount: number }) {
  return {
    document_id: m.documentId,
    source: m.sourcePath,
    collection: m.collection,
    title: m.title,
    year: m.year,
    doctrine: m.doctrine,
    tags: m.tags,
    ...(chunk ? { chunk_index: chunk.chunkIndex, chunk_count: chunk.chunkCount } : {}),
  };
}

export function memoryPayload(r: MemoryRecord) {
  return {
    memory_id: r.memoryId,
    user_id: r.userId,
    scope: r.scope,
    memory: r.memory,
    tags: r.tags,
    source: r.source,
    importance: r.importance,
    created_at: r.createdAt,
    ...(r.score === undefined ? {} : { score: r.score }),
  };
}

function chunkPayload(c: DocumentChunk) {
  return {
    chunk_id: c.chunkId,
    chunk_index: c.chunkIndex,
    text: c.text,
    metadata: metadataPayload(c.metadata, c),
  };
}

export interface ToolServices {
  retriever: KnowledgeRetriever;
  /** Null when no memory backend is configured; memory tools then fail as unavailable. */
  memory: MemoryGateway | null;
}

/** Registry holding the eight `v1` tools. */
export function buildToolRegistry(services: ToolServices): ToolRegistry {
  const { retriever } = services;
  const registry = new ToolRegistry();
  const memory = (): MemoryGateway => {
    if (!services.memory) throw new ToolInvocationError("memory backend not configured");
    return services.memory;
  };

  registry.register({
    name: "search_wargame_docs",
    label: "Search Wargame Documents",
    description: `Semantic search over the ingested doctrine, after-action report, scenario and intelligence corpus.

Returns: Ranked chunks with similarity scores and document metadata
Best for:
- Establishing facts before stating them
- Finding doctrine or lessons learned on a topic`,
    source: "knowledge",
    role: "primary",
    parameters: Type.Object({
      query: Type.String({ minLength: 1, description: "Natural-language query" }),
      top_k: Type.Integer({ default: 8, minimum: 1, maximum: 50, description: "Maximum results (default: 8)" }),
      min_score: Type.Number({ default: 0, minimum: 0, maximum: 1, description: "Drop results scoring below this" }),
      collections: Type.Optional(
        Type.Array(Type.String(), { description: "Restrict to these collections (doctrine, aar, scenario, intel, other)" }),
      ),
      correlation_id: CorrelationId,
    }),
    async handler(input, ctx) {
      const hits = await retriever.search(
        input.query,
        { topK: input.top_k, minScore: input.min_score, collections: input.collections },
        ctx,
      );
      return {
        results: hits.map((h) => ({
          chunk_id: h.chunkId,
          text: h.text,
          score: h.score,
          metadata: metadataPayload(h.metadata, h),
        })),
      };
    },
  });

  registry.register({
    name: "get_doc_span",
    label: "Get Document Span",
    description: "Fetch the chunks surrounding a search hit for extended context. Clipped at document boundaries.",
    source: "knowledge",
    role: "secondary",
    parameters: Type.Object({
      document_id: Type.String({ minLength: 1 }),
      center_chunk_index: Type.Integer({ minimum: 0 }),
      span: Type.Integer({ default: 2, minimum: 0, description: "Chunks on each side (default: 2)" }),
      correlation_id: CorrelationId,
    }),
    async handler(input) {
      const chunks = await retriever.getSpan(input.document_id, input.center_chunk_index, input.span);
      return { chunks: chunks.map(chunkPayload) };
    },
  });

  registry.register({
    name: "list_collections",
    label: "List Collections",
    description: "List corpus collections with their document counts.",
    source: "knowledge",
    parameters: Type.Object({ correlation_id: CorrelationId }),
    async handler() {
      const collections = await retriever.listCollections();
      return {
        collections: collections.map((c) => ({
          name: c.name,
          document_count: c.documentCount,
          description: c.description,
        })),
      };
    },
  });

  registry.register({
    name: "health_check",
    label: "Health Check",
    description: "Report whether the document index is reachable and populated.",
    source: "knowledge",
    parameters: Type.Object({ correlation_id: CorrelationId }),
    async handler() {
      return retriever.healthCheck();
    },
  });

  registry.register({
    name: "memory_search",
    label: "Search Memory",
    description: `Search a user's long-term memories (prior analyses, preferences, scenario facts).

Best for:
- Questions that refer to earlier sessions
- Checking what is already known before searching documents`,
    source: "memory",
    role: "primary",
    parameters: Type.Object({
      query: Type.String({ minLength: 1 }),
      user_id: Type.String({ minLength: 1 }),
      limit: Type.Integer({ default: 5, minimum: 1, description: "Maximum results (default: 5)" }),
      scopes: Type.Optional(Type.Array(Scope)),
      correlation_id: CorrelationId,
    }),
    async handler(input, ctx) {
      const results = await memory().search(input.query, input.user_id, input.limit, input.scopes, ctx);
      return { results: results.map(memoryPayload) };
    },
  });

  registry.register({
    name: "memory_add",
    label: "Add Memory",
    description:
      "Store a durable memory for a user. Near-duplicates of an existing memory are not stored twice; the daily quota and length cap are reported as status rejected_quota.",
    source: "memory",
    parameters: Type.Object({
      user_id: Type.String({ minLength: 1 }),
      memory: Type.String({ minLength: 1 }),
      scope: Type.Optional(Scope),
      tags: Type.Optional(Type.Array(Type.String())),
      source: Type.Optional(Type.String()),
      correlation_id: CorrelationId,
    }),
    async handler(input, ctx) {
      const result = await memory().add(
        {
          userId: input.user_id,
          memory: input.memory,
          scope: input.scope ?? "user",
          tags: input.tags,
          source: input.source,
        },
        ctx,
      );
      return {
        memory_id: result.memoryId,
        status: result.status,
        ...(result.reason ? { reason: result.reason } : {}),
      };
    },
  });

  registry.register({
    name: "memory_delete",
    label: "Delete Memory",
    description: "Delete one memory by id.",
    source: "memory",
    parameters: Type.Object({
      memory_id: Type.String({ minLength: 1 }),
      correlation_id: CorrelationId,
    }),
    async handler(input, ctx) {
      return { status: await memory().delete(input.memory_id, ctx) };
    },
  });

  registry.register({
    name: "memory_list",
    label: "List Memories",
    description: "List a user's memories, optionally filtered by scope and tags.",
    source: "memory",
    role: "secondary",
    parameters: Type.Object({
      user_id: Type.String({ minLength: 1 }),
      limit: Type.Integer({ default: 5, minimum: 1 }),
      scope: Type.Optional(Scope),
      tags: Type.Optional(Type.Array(Type.String())),
      correlation_id: CorrelationId,
    }),
    async handler(input, ctx) {
      const memories = await memory().list(input.user_id, input.limit, input.scope, input.tags, ctx);
      return { memories: memories.map(memoryPayload) };
    },
  });

  return registry;
}
