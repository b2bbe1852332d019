export type SessionStatus = "running" | "completed" | "partial" | "failed";

/** Orchestrator state machine positions. COMPLETED and FAILED are terminal. */
export type OrchestratorState = "ITERATING" | "CIRCUIT_OPEN" | "COMPLETED" | "FAILED";

export type AttemptOutcome = "success" | "error" | "timeout";

export interface ToolCallAttempt {
  toolName: string;
  attemptNumber: number;
  outcome: AttemptOutcome;
  latencyMs: number;
  error?: string;
}

export interface ToolResultEntry {
  iteration: number;
  /** Tool that actually ran (differs from `requestedTool` after a fallback). */
  toolName: string;
  requestedTool: string;
  /** Model-assigned call id, when the policy supplied one. */
  callId?: string;
  input: Record<string, unknown>;
  ok: boolean;
  output?: unknown;
  error?: string;
  /** Set when the call never ran because its circuit (and its fallback's) was open. */
  skipped?: boolean;
}

export interface OrchestrationSession {
  correlationId: string;
  userId: string;
  question: string;
  iterationCount: number;
  results: ToolResultEntry[];
  attempts: ToolCallAttempt[];
  status: SessionStatus;
  state: OrchestratorState;
}

export interface SessionResult {
  correlationId: string;
  userId: string;
  status: Exclude<SessionStatus, "running">;
  iterations: number;
  results: ToolResultEntry[];
  attempts: ToolCallAttempt[];
  answer?: string;
  reason?: string;
}

export function toSessionResult(session: OrchestrationSession, extra: { answer?: string; reason?: string } = {}): SessionResult {
  const status = session.status === "running" ? "failed" : session.status;
  return {
    correlationId: session.correlationId,
    userId: session.userId,
    status,
    iterations: session.iterationCount,
    results: session.results,
    attempts: session.attempts,
    ...(extra.answer !== undefined ? { answer: extra.answer } : {}),
    ...(extra.reason !== undefined ? { reason: extra.reason } : {}),
  };
}
