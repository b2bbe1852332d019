import { fields, log } from "../logger.js";

export interface CircuitBreakerState {
  toolName: string;
  consecutiveFailures: number;
  /** Epoch ms; null while the circuit is closed. */
  openUntil: number | null;
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  cooldownMs: number;
  clock?: () => number;
}

/**
 * Consecutive-failure breakers keyed by tool name, shared by every session.
 * Each update is a synchronous read-modify-write, so concurrent sessions on
 * the event loop cannot lose a failure count.
 */
export class CircuitBreakerRegistry {
  private readonly states = new Map<string, CircuitBreakerState>();
  private readonly clock: () => number;

  constructor(private readonly opts: CircuitBreakerOptions) {
    this.clock = opts.clock ?? Date.now;
  }

  private state(toolName: string): CircuitBreakerState {
    let s = this.states.get(toolName);
    if (!s) {
      s = { toolName, consecutiveFailures: 0, openUntil: null };
      this.states.set(toolName, s);
    }
    return s;
  }

  /** True while `open_until` lies in the future. */
  isOpen(toolName: string): boolean {
    const s = this.states.get(toolName);
    return s?.openUntil != null && s.openUntil > this.clock();
  }

  recordSuccess(toolName: string): void {
    const s = this.state(toolName);
    s.consecutiveFailures = 0;
    s.openUntil = null;
  }

  /**
   * Count one failure; returns true when this failure opened the circuit.
   * The count is kept past the cooldown, so a failing trial call re-opens at once.
   */
  recordFailure(toolName: string): boolean {
    const s = this.state(toolName);
    s.consecutiveFailures += 1;
    if (s.consecutiveFailures < this.opts.failureThreshold) return false;
    s.openUntil = this.clock() + this.opts.cooldownMs;
    log.warn(`circuit.open ${fields({ tool: toolName, openUntil: new Date(s.openUntil).toISOString() })}`);
    return true;
  }

  snapshot(toolName: string): CircuitBreakerState {
    return { ...this.state(toolName) };
  }

  reset(): void {
    this.states.clear();
  }
}
