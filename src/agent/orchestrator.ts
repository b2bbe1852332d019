import { randomUUID } from "node:crypto";
import { KindGuard } from "@sinclair/typebox";
import { CircuitOpenError, describeError, isRetryable, OrchestrationTimeoutError, ToolInvocationError, ValidationError } from "../errors.js";
import { fields, log } from "../logger.js";
import type { CircuitBreakerRegistry } from "../resilience/circuit-breaker.js";
import type { RetryPolicy, Sleep } from "../resilience/retry.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { AgentDecision, AgentPolicy } from "./policy.js";
import { toSessionResult } from "./session.js";
import type { OrchestrationSession, SessionResult, SessionStatus, ToolResultEntry } from "./session.js";

export interface OrchestratorOptions {
  maxToolIterations: number;
  toolTimeoutMs: number;
  sessionTimeoutMs: number;
  retry: RetryPolicy;
  breakers: CircuitBreakerRegistry;
  sleep?: Sleep;
  /** Store the final answer as an agent-scope memory. */
  rememberAnswer?: boolean;
}

export interface RunOptions {
  userId: string;
  correlationId?: string;
  signal?: AbortSignal;
}

/** Race `promise` against `signal`; the loser's rejection is still observed. */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Drives one agent session: ITERATING until the policy completes, the
 * iteration cap is hit, every data source is circuit-open, or time runs out.
 * Always returns a result with an explicit status.
 */
export class ToolOrchestrator {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly policy: AgentPolicy,
    private readonly opts: OrchestratorOptions,
  ) {}

  async run(question: string, runOpts: RunOptions): Promise<SessionResult> {
    const session: OrchestrationSession = {
      correlationId: runOpts.correlationId ?? randomUUID(),
      userId: runOpts.userId,
      question,
      iterationCount: 0,
      results: [],
      attempts: [],
      status: "running",
      state: "ITERATING",
    };
    log.info(`session.start ${fields({ correlationId: session.correlationId, userId: session.userId, policy: this.policy.name })}`);

    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new OrchestrationTimeoutError(this.opts.sessionTimeoutMs)),
      this.opts.sessionTimeoutMs,
    );
    const external = runOpts.signal;
    const onExternalAbort = () => controller.abort(external?.reason ?? new Error("session cancelled"));
    if (external?.aborted) onExternalAbort();
    else external?.addEventListener("abort", onExternalAbort, { once: true });

    try {
      return await this.loop(session, controller.signal);
    } finally {
      clearTimeout(timer);
      external?.removeEventListener("abort", onExternalAbort);
    }
  }

  private async loop(session: OrchestrationSession, signal: AbortSignal): Promise<SessionResult> {
    for (;;) {
      if (signal.aborted) return this.finish(session, "failed", { reason: describeError(signal.reason) });
      if (session.iterationCount >= this.opts.maxToolIterations) {
        return this.finish(session, "partial", {
          reason: `iteration cap of ${this.opts.maxToolIterations} reached`,
        });
      }
      if (this.noSourcesAvailable()) return this.finish(session, "failed", { reason: "no data sources available" });

      let decision: AgentDecision;
      try {
        decision = await abortable(this.policy.next(session, signal), signal);
      } catch (err) {
        if (signal.aborted) continue;
        return this.finish(session, "failed", { reason: `agent policy failed: ${describeError(err)}` });
      }

      if (decision.kind === "complete") {
        if (this.opts.rememberAnswer && decision.answer) await this.rememberAnswer(session, decision.answer, signal);
        return this.finish(session, "completed", { answer: decision.answer });
      }
      await this.step(session, decision, signal);
    }
  }

  private async step(
    session: OrchestrationSession,
    decision: Extract<AgentDecision, { kind: "call" }>,
    signal: AbortSignal,
  ): Promise<void> {
    session.state = "ITERATING";
    const iteration = session.iterationCount + 1;
    const record = (entry: Omit<ToolResultEntry, "iteration" | "requestedTool" | "callId">) => {
      session.results.push({ iteration, requestedTool: decision.toolName, callId: decision.callId, ...entry });
      session.iterationCount = iteration;
    };

    let toolName = decision.toolName;
    let input: Record<string, unknown> = { ...decision.input };
    if (!this.registry.has(toolName)) {
      record({ toolName, input, ok: false, error: `unknown tool: ${toolName}` });
      return;
    }

    if (this.opts.breakers.isOpen(toolName)) {
      session.state = "CIRCUIT_OPEN";
      const fallback = this.fallbackFor(toolName);
      if (!fallback) {
        log.info(`session.skip ${fields({ correlationId: session.correlationId, tool: toolName, reason: "circuit_open" })}`);
        const openUntil = this.opts.breakers.snapshot(toolName).openUntil ?? Date.now();
        record({ toolName, input, ok: false, skipped: true, error: describeError(new CircuitOpenError(toolName, openUntil)) });
        return;
      }
      log.info(`session.fallback ${fields({ correlationId: session.correlationId, from: toolName, to: fallback })}`);
      toolName = fallback;
      input = this.fallbackInput(input, session);
    }

    input = this.withSessionFields(toolName, input, session);
    try {
      const output = await this.invokeWithRetry(toolName, input, session, signal);
      this.opts.breakers.recordSuccess(toolName);
      record({ toolName, input, ok: true, output });
    } catch (err) {
      // Bad input and cancellation say nothing about the tool's health.
      if (!signal.aborted && !(err instanceof ValidationError)) {
        if (this.opts.breakers.recordFailure(toolName)) session.state = "CIRCUIT_OPEN";
      }
      record({ toolName, input, ok: false, error: describeError(err) });
    }
  }

  private async invokeWithRetry(
    toolName: string,
    input: Record<string, unknown>,
    session: OrchestrationSession,
    signal: AbortSignal,
  ): Promise<unknown> {
    return this.opts.retry.execute(
      async (attempt) => {
        const started = Date.now();
        try {
          const output = await this.callWithTimeout(toolName, input, session, signal);
          session.attempts.push({ toolName, attemptNumber: attempt, outcome: "success", latencyMs: Date.now() - started });
          return output;
        } catch (err) {
          session.attempts.push({
            toolName,
            attemptNumber: attempt,
            outcome: err instanceof ToolInvocationError && err.timedOut ? "timeout" : "error",
            latencyMs: Date.now() - started,
            error: describeError(err),
          });
          throw err;
        }
      },
      {
        signal,
        sleep: this.opts.sleep,
        shouldRetry: (err) => !signal.aborted && isRetryable(err),
        onRetry: (err, attempt, delayMs) =>
          log.debug(`session.retry ${fields({ correlationId: session.correlationId, tool: toolName, attempt, delayMs })}: ${describeError(err)}`),
      },
    );
  }

  private async callWithTimeout(
    toolName: string,
    input: Record<string, unknown>,
    session: OrchestrationSession,
    signal: AbortSignal,
  ): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(
      () =>
        controller.abort(
          new ToolInvocationError(`${toolName} timed out after ${this.opts.toolTimeoutMs}ms`, { timedOut: true }),
        ),
      this.opts.toolTimeoutMs,
    );
    const onSessionAbort = () => controller.abort(signal.reason);
    if (signal.aborted) onSessionAbort();
    else signal.addEventListener("abort", onSessionAbort, { once: true });
    try {
      return await abortable(
        this.registry.invoke(toolName, input, { correlationId: session.correlationId, signal: controller.signal }),
        controller.signal,
      );
    } finally {
      clearTimeout(timer);
      signal.removeEventListener("abort", onSessionAbort);
    }
  }

  private noSourcesAvailable(): boolean {
    const primaries = this.registry.primaries();
    return primaries.length > 0 && primaries.every((tool) => this.opts.breakers.isOpen(tool.name));
  }

  /** First closed primary tool of another source, when `toolName` may be rerouted. */
  private fallbackFor(toolName: string): string | undefined {
    const tool = this.registry.get(toolName);
    if (!tool?.role) return undefined;
    return this.registry
      .primaries()
      .find((candidate) => candidate.source !== tool.source && !this.opts.breakers.isOpen(candidate.name))?.name;
  }

  /**
   * Set `user_id` and `correlation_id` where the tool's schema takes them. The
   * session's user always wins over a model-supplied `user_id`.
   */
  private withSessionFields(
    toolName: string,
    input: Record<string, unknown>,
    session: OrchestrationSession,
  ): Record<string, unknown> {
    const schema = this.registry.get(toolName)?.parameters;
    if (!schema || !KindGuard.IsObject(schema)) return input;
    const out = { ...input };
    if ("user_id" in schema.properties) out.user_id = session.userId;
    if ("correlation_id" in schema.properties) out.correlation_id = session.correlationId;
    return out;
  }

  private fallbackInput(requested: Record<string, unknown>, session: OrchestrationSession): Record<string, unknown> {
    const query = typeof requested.query === "string" && requested.query.trim() ? requested.query : session.question;
    return { query };
  }

  private async rememberAnswer(session: OrchestrationSession, answer: string, signal: AbortSignal): Promise<void> {
    if (!this.registry.has("memory_add") || this.opts.breakers.isOpen("memory_add")) return;
    try {
      const input = this.withSessionFields(
        "memory_add",
        { memory: answer, scope: "agent", source: "agent-run", tags: ["agent-answer"] },
        session,
      );
      await this.callWithTimeout("memory_add", input, session, signal);
    } catch (err) {
      log.warn(`session.remember_failed ${fields({ correlationId: session.correlationId })}: ${describeError(err)}`);
    }
  }

  private finish(
    session: OrchestrationSession,
    status: Exclude<SessionStatus, "running">,
    extra: { answer?: string; reason?: string },
  ): SessionResult {
    session.status = status;
    session.state = status === "completed" ? "COMPLETED" : "FAILED";
    log.info(
      `session.end ${fields({
        correlationId: session.correlationId,
        status,
        iterations: session.iterationCount,
        reason: extra.reason,
      })}`,
    );
    return toSessionResult(session, extra);
  }
}
