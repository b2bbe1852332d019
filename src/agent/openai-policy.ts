import OpenAI from "openai";
import type { FunctionTool, ResponseCreateParamsNonStreaming, ResponseInputItem } from "openai/resources/responses/responses";
import { z } from "zod";
import { ToolInvocationError } from "../errors.js";
import { log } from "../logger.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { AgentDecision, AgentPolicy } from "./policy.js";
import type { OrchestrationSession } from "./session.js";

export const SYSTEM_PROMPT = `You are a doctrine-focused wargame analyst.
Always follow these rules:
- Search the wargaming corpus (search_wargame_docs) before stating facts.
- Query memory (memory_search) whenever the user references past scenarios, decisions, or preferences.
- Merge findings from doctrine and memory, mention concrete chunk titles, and highlight conflicts.
- If a tool is unavailable, explain the limitation in the final answer instead of inventing facts.
- Prefer concise COA tables, explicit assumptions, and cite lessons learned when recommending actions.`;

/** The subset of a model response the policy reads. */
export interface AgentModelOutput {
  outputText: string;
  functionCalls: Array<{ callId: string; name: string; arguments: string }>;
}

export interface AgentModelClient {
  createResponse(body: ResponseCreateParamsNonStreaming, signal?: AbortSignal): Promise<AgentModelOutput>;
}

/** Adapt the OpenAI SDK's Responses API to `AgentModelClient`. */
export function openAiModelClient(client: OpenAI): AgentModelClient {
  return {
    async createResponse(body, signal) {
      const res = await client.responses.create(body, { signal });
      return {
        outputText: res.output_text,
        functionCalls: res.output.flatMap((item) =>
          item.type === "function_call" ? [{ callId: item.call_id, name: item.name, arguments: item.arguments }] : [],
        ),
      };
    },
  };
}

const ArgumentsSchema = z.record(z.unknown());

export interface OpenAiPolicyOptions {
  model: string;
  temperature: number;
}

/**
 * Lets an OpenAI model pick the next tool from the registry's schemas and
 * decide when it can answer. Prior calls are replayed as function call items.
 */
export class OpenAiAgentPolicy implements AgentPolicy {
  readonly name = "openai";

  constructor(
    private readonly client: AgentModelClient,
    private readonly registry: ToolRegistry,
    private readonly opts: OpenAiPolicyOptions,
  ) {}

  tools(): FunctionTool[] {
    return this.registry.list().map((t) => ({
      type: "function",
      name: t.name,
      description: t.description,
      parameters: t.parameters,
      strict: false,
    }));
  }

  buildRequest(session: Readonly<OrchestrationSession>): ResponseCreateParamsNonStreaming {
    const input: ResponseInputItem[] = [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: `${session.question}\n\n(user_id: ${session.userId})` },
    ];
    for (const entry of session.results) {
      const callId = entry.callId ?? `call_${entry.iteration}`;
      input.push({
        type: "function_call",
        call_id: callId,
        name: entry.requestedTool,
        arguments: JSON.stringify(entry.input),
      });
      const output = entry.ok
        ? entry.toolName === entry.requestedTool
          ? entry.output
          : { fallback_tool: entry.toolName, result: entry.output }
        : { error: entry.error ?? "tool failed", skipped: entry.skipped === true };
      input.push({ type: "function_call_output", call_id: callId, output: JSON.stringify(output) });
    }
    return {
      model: this.opts.model,
      temperature: this.opts.temperature,
      input,
      tools: this.tools(),
      metadata: { user_id: session.userId, correlation_id: session.correlationId },
    };
  }

  async next(session: Readonly<OrchestrationSession>, signal?: AbortSignal): Promise<AgentDecision> {
    let response: AgentModelOutput;
    try {
      response = await this.client.createResponse(this.buildRequest(session), signal);
    } catch (err) {
      throw new ToolInvocationError(`agent model request failed: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }

    const [call] = response.functionCalls;
    if (!call) return { kind: "complete", answer: response.outputText };
    if (response.functionCalls.length > 1) {
      log.debug(`agent: model requested ${response.functionCalls.length} calls; running the first`);
    }

    let args: Record<string, unknown> = {};
    try {
      const parsed = ArgumentsSchema.safeParse(JSON.parse(call.arguments || "{}"));
      if (parsed.success) args = parsed.data;
      else log.warn(`agent: ignoring non-object arguments for ${call.name}`);
    } catch (err) {
      log.warn(`agent: unparseable arguments for ${call.name}: ${String(err)}`);
    }
    return { kind: "call", toolName: call.name, input: args, callId: call.callId };
  }
}
