import { mergeTags } from "../documents.js";
import { similarity } from "../embeddings.js";
import type { EmbeddingProvider } from "../embeddings.js";
import { fields, log } from "../logger.js";
import type { CallContext, ConsolidationReport, MemoryRecord, SimilarityMetric } from "../types.js";
import type { MemoryBackend } from "./client.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ConsolidationSettings {
  ttlDays: number;
  halfLifeDays: number;
  mergeThreshold: number;
  minImportance: number;
  scanLimit: number;
  similarityMetric: SimilarityMetric;
}

export function decayImportance(importance: number, elapsedMs: number, halfLifeDays: number): number {
  if (elapsedMs <= 0 || halfLifeDays <= 0) return importance;
  return importance * Math.pow(0.5, elapsedMs / DAY_MS / halfLifeDays);
}

function parseTime(value: string | undefined): number | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isFinite(ms) ? ms : null;
}

/**
 * Maintenance pass over stored memories: decay importance, evict expired or
 * faded records, merge near-duplicates that slipped past the add-time check.
 *
 * Decay is anchored on each record's persisted `decayedAt`, so passes from
 * different processes compound to `0.5^(age / halfLife)`. A backend without
 * `update` keeps its anchors and the next pass decays over the whole interval.
 */
export class MemoryConsolidator {
  constructor(
    private readonly backend: MemoryBackend,
    private readonly embeddings: EmbeddingProvider,
    private readonly settings: ConsolidationSettings,
    private readonly clock: () => number = Date.now,
  ) {}

  async run(userIds: readonly string[], ctx: CallContext = {}): Promise<ConsolidationReport> {
    const report: ConsolidationReport = { scanned: 0, decayed: 0, evicted: 0, merged: 0 };
    const now = this.clock();

    for (const userId of userIds) {
      const records = await this.backend.list({ userId, limit: this.settings.scanLimit }, ctx);
      report.scanned += records.length;
      const survivors: MemoryRecord[] = [];
      const dirty = new Set<string>();

      for (const record of records) {
        const createdAt = parseTime(record.createdAt) ?? now;
        if (now - createdAt > this.settings.ttlDays * DAY_MS) {
          await this.evict(record, report, ctx, "ttl");
          continue;
        }
        const anchor = Math.max(createdAt, parseTime(record.decayedAt) ?? createdAt);
        const importance = decayImportance(record.importance, now - anchor, this.settings.halfLifeDays);
        if (importance < this.settings.minImportance) {
          await this.evict(record, report, ctx, "importance");
          continue;
        }
        if (importance !== record.importance) {
          record.importance = importance;
          record.decayedAt = new Date(now).toISOString();
          dirty.add(record.memoryId);
          report.decayed += 1;
        }
        survivors.push(record);
      }

      for (const merged of await this.mergeDuplicates(survivors, ctx)) {
        merged.kept.decayedAt = new Date(now).toISOString();
        dirty.add(merged.kept.memoryId);
        report.merged += 1;
      }

      if (this.backend.update) {
        for (const record of survivors) {
          if (dirty.has(record.memoryId)) await this.backend.update(record, ctx);
        }
      } else if (dirty.size > 0) {
        log.debug(`consolidation: backend has no update; ${dirty.size} change(s) not written back`);
      }
    }

    log.info(`consolidation.complete ${fields({ users: userIds.length, ...report })}`);
    return report;
  }

  private async evict(record: MemoryRecord, report: ConsolidationReport, ctx: CallContext, why: string): Promise<void> {
    const status = await this.backend.delete(record.memoryId, ctx);
    if (status === "deleted") report.evicted += 1;
    log.debug(`consolidation.evict ${fields({ memoryId: record.memoryId, reason: why, status })}`);
  }

  /**
   * Fold each record into the oldest earlier record of the same scope it is
   * near-identical to. Removes merged records from `records` in place.
   */
  private async mergeDuplicates(
    records: MemoryRecord[],
    ctx: CallContext,
  ): Promise<Array<{ kept: MemoryRecord; removed: MemoryRecord }>> {
    if (records.length < 2) return [];
    records.sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.memoryId.localeCompare(b.memoryId));
    const vectors = await this.embeddings.embed(records.map((r) => r.memory), ctx.signal);

    const merges: Array<{ kept: MemoryRecord; removed: MemoryRecord }> = [];
    const keptIdx: number[] = [];
    const removedIds = new Set<string>();

    for (let j = 0; j < records.length; j++) {
      const candidate = records[j];
      const vj = vectors[j];
      if (!candidate || !vj) continue;
      let target: MemoryRecord | null = null;
      for (const i of keptIdx) {
        const kept = records[i];
        const vi = vectors[i];
        if (!kept || !vi || kept.scope !== candidate.scope || kept.userId !== candidate.userId) continue;
        if (similarity(this.settings.similarityMetric, vi, vj) >= this.settings.mergeThreshold) {
          target = kept;
          break;
        }
      }
      if (!target) {
        keptIdx.push(j);
        continue;
      }
      target.tags = mergeTags(target.tags, candidate.tags);
      target.importance = Math.max(target.importance, candidate.importance);
      await this.backend.delete(candidate.memoryId, ctx);
      removedIds.add(candidate.memoryId);
      merges.push({ kept: target, removed: candidate });
    }

    const remaining = records.filter((r) => !removedIds.has(r.memoryId));
    records.splice(0, records.length, ...remaining);
    return merges;
  }
}
