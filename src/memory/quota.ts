/**
 * Per-user, per-UTC-day counter for memory writes.
 *
 * `reserve` checks and increments in one synchronous step, so concurrent adds
 * for the same user cannot both take the last slot. A reservation that does
 * not end in a new record is handed back with `release`.
 */
export class DailyQuota {
  private readonly counts = new Map<string, number>();
  private currentDay = "";

  constructor(
    private readonly limit: number,
    private readonly clock: () => number = Date.now,
  ) {}

  private rollover(): string {
    const day = new Date(this.clock()).toISOString().slice(0, 10);
    if (day !== this.currentDay) {
      this.counts.clear();
      this.currentDay = day;
    }
    return day;
  }

  used(userId: string): number {
    this.rollover();
    return this.counts.get(userId) ?? 0;
  }

  remaining(userId: string): number {
    return Math.max(0, this.limit - this.used(userId));
  }

  /** Take one slot; returns the day it was charged to, or null when exhausted. */
  reserve(userId: string): string | null {
    const day = this.rollover();
    const used = this.counts.get(userId) ?? 0;
    if (used >= this.limit) return null;
    this.counts.set(userId, used + 1);
    return day;
  }

  release(userId: string, day: string): void {
    // A reservation from a previous day was already wiped by the rollover.
    if (this.rollover() !== day) return;
    const used = this.counts.get(userId) ?? 0;
    if (used > 0) this.counts.set(userId, used - 1);
  }
}
