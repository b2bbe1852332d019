import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ToolInvocationError, ValidationError, WargameError } from "../errors.js";
import { timed } from "../logger.js";
import type { CallContext } from "../types.js";

/** Which data source a tool reads. Fallback crosses from one source to the other. */
export type ToolSource = "knowledge" | "memory";

/**
 * Part a tool plays when a circuit opens. A `primary` tool is its source's
 * search and is the fallback target for tools of the other source; a
 * `secondary` tool falls back but is never a target. Tools without a role are
 * never rerouted.
 */
export type ToolRole = "primary" | "secondary";

export interface ToolDescriptor<S extends TSchema = TSchema> {
  name: string;
  label: string;
  description: string;
  source: ToolSource;
  role?: ToolRole;
  parameters: S;
  handler(input: Static<S>, ctx: CallContext): Promise<unknown>;
}

export const TOOL_SURFACE_VERSION = "v1";

/**
 * Fixed table of tools resolved by name at call time. Input is validated
 * against the tool's schema, with schema defaults applied, before the handler runs.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDescriptor>();

  register<S extends TSchema>(tool: ToolDescriptor<S>): void {
    if (this.tools.has(tool.name)) throw new ValidationError(`tool already registered: ${tool.name}`);
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()];
  }

  primaries(): ToolDescriptor[] {
    return this.list().filter((tool) => tool.role === "primary");
  }

  /** Validate `input` and apply defaults; throws `ValidationError` naming the first problem. */
  prepare(name: string, input: unknown): { tool: ToolDescriptor; params: unknown } {
    const tool = this.tools.get(name);
    if (!tool) throw new ValidationError(`unknown tool: ${name}`);
    const params = Value.Default(tool.parameters, Value.Clone(input ?? {}));
    if (!Value.Check(tool.parameters, params)) {
      const first = Value.Errors(tool.parameters, params).First();
      const where = first?.path ? ` at ${first.path}` : "";
      throw new ValidationError(`invalid input for ${name}${where}: ${first?.message ?? "schema mismatch"}`);
    }
    return { tool, params };
  }

  async invoke(name: string, input: unknown, ctx: CallContext = {}): Promise<unknown> {
    const { tool, params } = this.prepare(name, input);
    const correlationId = correlationIdOf(params) ?? ctx.correlationId;
    const callCtx: CallContext = { ...ctx, correlationId };
    return timed(name, { correlationId }, async () => {
      try {
        return await tool.handler(params, callCtx);
      } catch (err) {
        if (err instanceof WargameError) throw err;
        throw new ToolInvocationError(`${name} failed: ${err instanceof Error ? err.message : String(err)}`, {
          cause: err,
        });
      }
    });
  }
}

function correlationIdOf(params: unknown): string | undefined {
  if (typeof params !== "object" || params === null || !("correlation_id" in params)) return undefined;
  return typeof params.correlation_id === "string" && params.correlation_id ? params.correlation_id : undefined;
}
