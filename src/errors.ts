/**
 * Error taxonomy.
 *
 * Ingestion errors (extraction, embedding, upsert) are caught per document and
 * reported in the batch summary. Tool invocation errors feed retry and the
 * circuit breaker. Only configuration errors and session exhaustion reach
 * callers as hard failures.
 */
export class WargameError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ExtractionError extends WargameError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("extraction_failed", message, options);
  }
}

export class EmbeddingError extends WargameError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("embedding_failed", message, options);
  }
}

export class IndexUpsertError extends WargameError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("index_upsert_failed", message, options);
  }
}

export class ValidationError extends WargameError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("validation_failed", message, options);
  }
}

export class ToolInvocationError extends WargameError {
  readonly timedOut: boolean;

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(options?.timedOut ? "tool_timeout" : "tool_invocation_failed", message, options);
    this.timedOut = options?.timedOut === true;
  }
}

export class MemoryBackendError extends ToolInvocationError {
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown; timedOut?: boolean }) {
    super(message, options);
    this.status = status;
  }
}

export class CircuitOpenError extends WargameError {
  readonly toolName: string;
  readonly openUntil: number;

  constructor(toolName: string, openUntil: number) {
    super("circuit_open", `circuit open for ${toolName} until ${new Date(openUntil).toISOString()}`);
    this.toolName = toolName;
    this.openUntil = openUntil;
  }
}

export class OrchestrationTimeoutError extends WargameError {
  constructor(timeoutMs: number) {
    super("orchestration_timeout", `session exceeded ${timeoutMs}ms`);
  }
}

export class ConfigurationError extends WargameError {
  constructor(message: string) {
    super("configuration_error", message);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof WargameError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Errors that a retry may cure. Validation problems and cancellations are final. */
export function isRetryable(err: unknown): boolean {
  if (err instanceof ValidationError) return false;
  if (err instanceof ConfigurationError) return false;
  if (err instanceof OrchestrationTimeoutError) return false;
  return true;
}
