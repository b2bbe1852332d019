import type { BackoffJitter } from "../types.js";

export interface RetryPolicyOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter?: BackoffJitter;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
export const defaultSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Exponential backoff: retry `n` (1-based) waits `min(maxDelay, base * 2^(n-1))`.
 * With full jitter the wait is drawn uniformly from [0, that delay].
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: BackoffJitter;

  constructor(
    opts: RetryPolicyOptions,
    private readonly random: () => number = Math.random,
  ) {
    this.maxRetries = Math.max(0, Math.floor(opts.maxRetries));
    this.baseDelayMs = Math.max(0, opts.baseDelayMs);
    this.maxDelayMs = Math.max(this.baseDelayMs, opts.maxDelayMs);
    this.jitter = opts.jitter ?? "none";
  }

  delayFor(attempt: number): number {
    const exp = this.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
    const capped = Math.min(this.maxDelayMs, exp);
    return this.jitter === "full" ? Math.floor(this.random() * capped) : capped;
  }

  /** Delays for every retry this policy allows, in order. */
  schedule(): number[] {
    return Array.from({ length: this.maxRetries }, (_, i) => this.delayFor(i + 1));
  }

  /**
   * Run `fn` until it succeeds, the retries run out, `shouldRetry` declines,
   * or `signal` aborts. The last error is rethrown.
   */
  async execute<T>(
    fn: (attempt: number) => Promise<T>,
    opts: {
      signal?: AbortSignal;
      sleep?: Sleep;
      shouldRetry?: (err: unknown) => boolean;
      onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
    } = {},
  ): Promise<T> {
    const sleep = opts.sleep ?? defaultSleep;
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (err) {
        const retriesUsed = attempt - 1;
        if (retriesUsed >= this.maxRetries || opts.signal?.aborted) throw err;
        if (opts.shouldRetry && !opts.shouldRetry(err)) throw err;
        const delay = this.delayFor(attempt);
        opts.onRetry?.(err, attempt, delay);
        await sleep(delay, opts.signal);
      }
    }
  }
}
