export interface LogSink {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const PREFIX = "[wargame]";

let sink: LogSink = console;
let debugEnabled = false;

/**
 * Route log output to `target`. Debug lines are dropped unless `debug` is set.
 * Safe to call more than once (e.g. again after config is parsed).
 */
export function initLogger(target: LogSink, debug: boolean): void {
  sink = target;
  debugEnabled = debug;
}

export const log = {
  debug(msg: string, ...rest: unknown[]): void {
    if (!debugEnabled) return;
    sink.debug(`${PREFIX} ${msg}`, ...rest);
  },
  info(msg: string, ...rest: unknown[]): void {
    sink.info(`${PREFIX} ${msg}`, ...rest);
  },
  warn(msg: string, ...rest: unknown[]): void {
    sink.warn(`${PREFIX} ${msg}`, ...rest);
  },
  error(msg: string, ...rest: unknown[]): void {
    sink.error(`${PREFIX} ${msg}`, ...rest);
  },
};

/** Render `key=value` pairs for a log line, skipping undefined values. */
export function fields(values: Record<string, unknown>): string {
  return Object.entries(values)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${Array.isArray(v) ? v.join(",") : String(v)}`)
    .join(" ");
}

/**
 * Run `fn` and log a `tool_call.complete` / `tool_call.failed` line with its latency.
 */
export async function timed<T>(
  toolName: string,
  context: Record<string, unknown>,
  fn: () => Promise<T>,
): Promise<T> {
  const started = Date.now();
  try {
    const out = await fn();
    log.debug(`tool_call.complete ${fields({ tool: toolName, latencyMs: Date.now() - started, ...context })}`);
    return out;
  } catch (err) {
    log.warn(
      `tool_call.failed ${fields({ tool: toolName, latencyMs: Date.now() - started, ...context })}: ${
        err instanceof Error ? err.message : String(err)
      }`,
    );
    throw err;
  }
}
