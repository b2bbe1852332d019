import { MemoryBackendError } from "../errors.js";
import { fields, log } from "../logger.js";
import { BackendAddSchema, BackendDeleteSchema, BackendListSchema } from "../schemas.js";
import type { BackendMemory } from "../schemas.js";
import type { CallContext, MemoryDeleteStatus, MemoryRecord, MemoryScope } from "../types.js";
import { MEMORY_SCOPES } from "../types.js";

export interface BackendSearchParams {
  query: string;
  userId: string;
  limit: number;
  scopes: MemoryScope[];
}

export interface BackendListParams {
  userId: string;
  limit: number;
  scope?: MemoryScope;
  tags?: string[];
}

export interface NewMemory {
  userId: string;
  scope: MemoryScope;
  memory: string;
  tags: string[];
  source: string | null;
  importance: number;
}

/** Storage contract for long-term memories. `update` and `listUsers` are optional. */
export interface MemoryBackend {
  search(params: BackendSearchParams, ctx?: CallContext): Promise<MemoryRecord[]>;
  add(memory: NewMemory, ctx?: CallContext): Promise<{ memoryId: string }>;
  delete(memoryId: string, ctx?: CallContext): Promise<MemoryDeleteStatus>;
  list(params: BackendListParams, ctx?: CallContext): Promise<MemoryRecord[]>;
  update?(record: MemoryRecord, ctx?: CallContext): Promise<void>;
  listUsers?(ctx?: CallContext): Promise<string[]>;
}

export interface HttpMemoryBackendOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

function isScope(value: unknown): value is MemoryScope {
  return typeof value === "string" && MEMORY_SCOPES.some((entry) => entry === value);
}

export function toMemoryRecord(raw: BackendMemory, fallbackUserId = ""): MemoryRecord {
  const record: MemoryRecord = {
    memoryId: raw.memory_id ?? raw.id ?? "",
    userId: raw.user_id ?? fallbackUserId,
    scope: isScope(raw.scope) ? raw.scope : "user",
    memory: raw.memory,
    tags: raw.tags ?? [],
    source: raw.source ?? null,
    importance: raw.importance ?? 0.5,
    createdAt: raw.created_at ?? new Date(0).toISOString(),
  };
  if (raw.decayed_at) record.decayedAt = raw.decayed_at;
  if (typeof raw.score === "number") record.score = raw.score;
  return record;
}

/**
 * REST client for the memory service. Constructed explicitly and owned by the
 * caller; there is no shared module-level instance.
 */
export class HttpMemoryBackend implements MemoryBackend {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: HttpMemoryBackendOptions) {
    const base = opts.baseUrl.trim().replace(/\/+$/, "");
    if (!base) throw new MemoryBackendError("memory base url must be configured", null);
    this.baseUrl = base;
    this.apiKey = opts.apiKey;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async search(params: BackendSearchParams, ctx: CallContext = {}): Promise<MemoryRecord[]> {
    const data = await this.request("POST", "/memories/search", ctx, {
      body: { query: params.query, user_id: params.userId, limit: params.limit, scopes: params.scopes },
    });
    return this.parseList(data, params.userId);
  }

  async add(memory: NewMemory, ctx: CallContext = {}): Promise<{ memoryId: string }> {
    const body: Record<string, unknown> = {
      user_id: memory.userId,
      memory: memory.memory,
      scope: memory.scope,
      tags: memory.tags,
      importance: memory.importance,
    };
    if (memory.source) body.source = memory.source;
    const data = await this.request("POST", "/memories", ctx, { body });
    const parsed = BackendAddSchema.safeParse(data);
    const memoryId = parsed.success ? (parsed.data.memory_id ?? parsed.data.id) : undefined;
    if (!memoryId) throw new MemoryBackendError("memory add response carried no memory id", null);
    return { memoryId };
  }

  async delete(memoryId: string, ctx: CallContext = {}): Promise<MemoryDeleteStatus> {
    try {
      const data = await this.request("DELETE", `/memories/${encodeURIComponent(memoryId)}`, ctx);
      // Some services answer 200 with a status body instead of 404.
      const parsed = BackendDeleteSchema.safeParse(data);
      return parsed.success && parsed.data.status === "not_found" ? "not_found" : "deleted";
    } catch (err) {
      if (err instanceof MemoryBackendError && err.status === 404) return "not_found";
      throw err;
    }
  }

  async list(params: BackendListParams, ctx: CallContext = {}): Promise<MemoryRecord[]> {
    const query = new URLSearchParams({ user_id: params.userId, limit: String(params.limit) });
    if (params.scope) query.set("scope", params.scope);
    if (params.tags && params.tags.length > 0) query.set("tags", params.tags.join(","));
    const data = await this.request("GET", `/memories?${query.toString()}`, ctx);
    return this.parseList(data, params.userId);
  }

  async update(record: MemoryRecord, ctx: CallContext = {}): Promise<void> {
    const body: Record<string, unknown> = { memory: record.memory, tags: record.tags, importance: record.importance };
    if (record.decayedAt) body.decayed_at = record.decayedAt;
    await this.request("PUT", `/memories/${encodeURIComponent(record.memoryId)}`, ctx, { body });
  }

  private parseList(data: unknown, userId: string): MemoryRecord[] {
    const parsed = BackendListSchema.safeParse(Array.isArray(data) ? { results: data } : data);
    if (!parsed.success) {
      throw new MemoryBackendError(`unexpected memory list payload: ${parsed.error.issues[0]?.message ?? "invalid"}`, null);
    }
    return parsed.data.results.map((m) => toMemoryRecord(m, userId));
  }

  private async request(
    method: string,
    pathAndQuery: string,
    ctx: CallContext,
    opts: { body?: unknown } = {},
  ): Promise<unknown> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (opts.body !== undefined) headers["Content-Type"] = "application/json";
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;
    if (ctx.correlationId) headers["X-Correlation-ID"] = ctx.correlationId;

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = ctx.signal ? AbortSignal.any([ctx.signal, timeout]) : timeout;

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${pathAndQuery}`, {
        method,
        headers,
        body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
        signal,
      });
    } catch (err) {
      const timedOut = timeout.aborted && !ctx.signal?.aborted;
      log.warn(`memory.request_error ${fields({ method, path: pathAndQuery, timedOut })}: ${String(err)}`);
      throw new MemoryBackendError(
        timedOut ? `memory request timed out after ${this.timeoutMs}ms` : `memory request error: ${String(err)}`,
        null,
        { cause: err, timedOut },
      );
    }

    const text = await res.text();
    if (!res.ok) {
      if (res.status !== 404) {
        log.warn(`memory.request_failed ${fields({ method, path: pathAndQuery, status: res.status })}: ${text.slice(0, 200)}`);
      }
      throw new MemoryBackendError(`memory request failed with status ${res.status}: ${text.slice(0, 200)}`, res.status);
    }
    if (!text) return {};
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new MemoryBackendError("memory response did not contain valid JSON", res.status, { cause: err });
    }
  }
}
