import type { OrchestrationSession, ToolResultEntry } from "./session.js";

export type AgentDecision =
  | { kind: "call"; toolName: string; input: Record<string, unknown>; callId?: string }
  | { kind: "complete"; answer?: string };

/**
 * The driving agent: picks the next tool call from the session so far, or
 * decides it has enough to answer.
 */
export interface AgentPolicy {
  readonly name: string;
  next(session: Readonly<OrchestrationSession>, signal?: AbortSignal): Promise<AgentDecision>;
}

function tried(session: Readonly<OrchestrationSession>, toolName: string): boolean {
  return session.results.some((r) => r.requestedTool === toolName || r.toolName === toolName);
}

function summarize(entry: ToolResultEntry): string[] {
  const out = entry.output;
  if (!entry.ok || typeof out !== "object" || out === null || !("results" in out) || !Array.isArray(out.results)) {
    return [];
  }
  const items: unknown[] = out.results;
  const lines: string[] = [];
  for (const item of items) {
    if (typeof item !== "object" || item === null) continue;
    if ("memory" in item && typeof item.memory === "string") {
      lines.push(`- [memory] ${item.memory}`);
    } else if ("text" in item && typeof item.text === "string") {
      const title =
        "metadata" in item && typeof item.metadata === "object" && item.metadata !== null && "title" in item.metadata
          ? String(item.metadata.title)
          : "document";
      lines.push(`- [${title}] ${item.text.replace(/\s+/g, " ").slice(0, 240)}`);
    }
  }
  return lines;
}

/**
 * Deterministic policy: consult memory, then the document corpus, then answer
 * with what both returned. Used offline and in tests.
 */
export class MemoryFirstPolicy implements AgentPolicy {
  readonly name = "memory-first";

  constructor(private readonly opts: { topK?: number; memoryLimit?: number } = {}) {}

  async next(session: Readonly<OrchestrationSession>): Promise<AgentDecision> {
    if (!tried(session, "memory_search")) {
      return {
        kind: "call",
        toolName: "memory_search",
        input: { query: session.question, user_id: session.userId, limit: this.opts.memoryLimit ?? 5 },
      };
    }
    if (!tried(session, "search_wargame_docs")) {
      return {
        kind: "call",
        toolName: "search_wargame_docs",
        input: { query: session.question, top_k: this.opts.topK ?? 8 },
      };
    }
    const lines = session.results.flatMap(summarize);
    const answer =
      lines.length > 0
        ? `Findings for "${session.question}":\n${lines.join("\n")}`
        : `No memory or corpus results were available for "${session.question}".`;
    return { kind: "complete", answer };
  }
}
