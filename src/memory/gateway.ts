import { ValidationError } from "../errors.js";
import { scoreImportance } from "../importance.js";
import { fields, log } from "../logger.js";
import type { CallContext, ConsolidationReport, MemoryAddResult, MemoryDeleteStatus, MemoryRecord, MemoryScope } from "../types.js";
import { MEMORY_SCOPES } from "../types.js";
import type { MemoryBackend } from "./client.js";
import type { MemoryConsolidator } from "./consolidation.js";
import { DailyQuota } from "./quota.js";

export interface MemoryGatewaySettings {
  dedupThreshold: number;
  maxChars: number;
  dailyQuota: number;
  defaultLimit: number;
  defaultScope: MemoryScope;
}

export interface AddMemoryInput {
  userId: string;
  memory: string;
  scope?: MemoryScope;
  tags?: string[];
  source?: string | null;
}

const EMPTY_REPORT: ConsolidationReport = { scanned: 0, decayed: 0, evicted: 0, merged: 0 };

/**
 * User-scoped memory operations over a `MemoryBackend`, with add-time
 * dedup, a per-user daily quota and periodic consolidation.
 */
export class MemoryGateway {
  private readonly quota: DailyQuota;
  private readonly seenUsers = new Set<string>();
  private consolidationTimer: ReturnType<typeof setInterval> | null = null;
  private consolidationInFlight: Promise<ConsolidationReport> | null = null;

  constructor(
    private readonly backend: MemoryBackend,
    private readonly settings: MemoryGatewaySettings,
    private readonly consolidator: MemoryConsolidator | null = null,
    clock: () => number = Date.now,
  ) {
    this.quota = new DailyQuota(settings.dailyQuota, clock);
  }

  async add(input: AddMemoryInput, ctx: CallContext = {}): Promise<MemoryAddResult> {
    const userId = requireUser(input.userId);
    const memory = input.memory.trim();
    if (!memory) throw new ValidationError("memory must not be empty");
    const scope = input.scope ?? this.settings.defaultScope;
    this.seenUsers.add(userId);

    if (memory.length > this.settings.maxChars) {
      log.info(`memory.rejected ${fields({ userId, reason: "too_long", length: memory.length })}`);
      return { memoryId: null, status: "rejected_quota", reason: "too_long" };
    }

    // Reserved before the first await: no other add for this user can interleave here.
    const day = this.quota.reserve(userId);
    if (day === null) {
      log.info(`memory.rejected ${fields({ userId, reason: "daily_quota" })}`);
      return { memoryId: null, status: "rejected_quota", reason: "daily_quota" };
    }

    try {
      const [top] = await this.backend.search({ query: memory, userId, limit: 1, scopes: [scope] }, ctx);
      if (top && (top.score ?? 0) >= this.settings.dedupThreshold) {
        this.quota.release(userId, day);
        log.debug(`memory.deduplicated ${fields({ userId, memoryId: top.memoryId, score: top.score })}`);
        return { memoryId: top.memoryId, status: "deduplicated" };
      }

      const tags = input.tags ?? [];
      const { memoryId } = await this.backend.add(
        {
          userId,
          scope,
          memory,
          tags,
          source: input.source ?? null,
          importance: scoreImportance(memory, scope, tags).score,
        },
        ctx,
      );
      log.debug(`memory.created ${fields({ userId, memoryId, scope, correlationId: ctx.correlationId })}`);
      return { memoryId, status: "created" };
    } catch (err) {
      this.quota.release(userId, day);
      throw err;
    }
  }

  async search(
    query: string,
    userId: string,
    limit: number = this.settings.defaultLimit,
    scopes?: MemoryScope[],
    ctx: CallContext = {},
  ): Promise<MemoryRecord[]> {
    const user = requireUser(userId);
    requireLimit(limit);
    if (!query.trim()) throw new ValidationError("query must not be empty");
    this.seenUsers.add(user);
    const results = await this.backend.search(
      { query, userId: user, limit, scopes: scopes && scopes.length > 0 ? scopes : [...MEMORY_SCOPES] },
      ctx,
    );
    return results
      .filter((r) => r.userId === user)
      .sort((a, b) => (b.score ?? 0) - (a.score ?? 0) || a.memoryId.localeCompare(b.memoryId))
      .slice(0, limit);
  }

  async delete(memoryId: string, ctx: CallContext = {}): Promise<MemoryDeleteStatus> {
    if (!memoryId.trim()) throw new ValidationError("memory_id must not be empty");
    return this.backend.delete(memoryId, ctx);
  }

  async list(
    userId: string,
    limit: number = this.settings.defaultLimit,
    scope?: MemoryScope,
    tags?: string[],
    ctx: CallContext = {},
  ): Promise<MemoryRecord[]> {
    const user = requireUser(userId);
    requireLimit(limit);
    this.seenUsers.add(user);
    const records = await this.backend.list({ userId: user, limit, scope, tags }, ctx);
    return records.slice(0, limit);
  }

  remainingQuota(userId: string): number {
    return this.quota.remaining(userId);
  }

  /**
   * One consolidation pass. Overlapping calls share the pass already running.
   * Without `userIds` it covers every user the backend lists, or the users this
   * gateway has served when the backend cannot list them; with neither it
   * throws `ValidationError` rather than report an empty pass.
   */
  async consolidate(userIds?: string[], ctx: CallContext = {}): Promise<ConsolidationReport> {
    if (!this.consolidator) return { ...EMPTY_REPORT };
    if (this.consolidationInFlight) return this.consolidationInFlight;
    if (!userIds && !this.canResolveUsers()) {
      throw new ValidationError("no users to consolidate: the memory backend cannot list users, so pass user ids");
    }
    const consolidator = this.consolidator;
    const pass = (async () => {
      const users = userIds ?? (this.backend.listUsers ? await this.backend.listUsers(ctx) : [...this.seenUsers]);
      return consolidator.run(users, ctx);
    })();
    this.consolidationInFlight = pass;
    try {
      return await pass;
    } finally {
      this.consolidationInFlight = null;
    }
  }

  startConsolidation(intervalMs: number): void {
    if (this.consolidationTimer || !this.consolidator || intervalMs <= 0) return;
    this.consolidationTimer = setInterval(() => {
      if (!this.canResolveUsers()) return;
      this.consolidate().catch((err: unknown) => {
        log.warn(`consolidation failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }, intervalMs);
    this.consolidationTimer.unref();
  }

  stopConsolidation(): void {
    if (!this.consolidationTimer) return;
    clearInterval(this.consolidationTimer);
    this.consolidationTimer = null;
  }

  private canResolveUsers(): boolean {
    return Boolean(this.backend.listUsers) || this.seenUsers.size > 0;
  }
}

function requireUser(userId: string): string {
  const user = userId.trim();
  if (!user) throw new ValidationError("user_id must not be empty");
  return user;
}

function requireLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) throw new ValidationError(`limit must be >= 1 (got ${limit})`);
}
