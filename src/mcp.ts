import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import { KindGuard } from "@sinclair/typebox";
import { describeError } from "./errors.js";
import { fields, log } from "./logger.js";
import type { LogSink } from "./logger.js";
import type { ToolDescriptor, ToolRegistry } from "./tools/registry.js";
import { TOOL_SURFACE_VERSION } from "./tools/registry.js";

// stdout carries the protocol; every log line goes to stderr.
export const stderrSink: LogSink = {
  debug: (...args) => console.error(...args),
  info: (...args) => console.error(...args),
  warn: (...args) => console.error(...args),
  error: (...args) => console.error(...args),
};

export function toMcpTool(tool: ToolDescriptor): Tool {
  const schema = tool.parameters;
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: KindGuard.IsObject(schema)
      ? { type: "object", properties: schema.properties, required: schema.required }
      : { type: "object" },
  };
}

export function textResult(value: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

/** An MCP server exposing every tool in `registry`. Connect a transport to start it. */
export function createMcpServer(registry: ToolRegistry): Server {
  const server = new Server(
    { name: "wargame-knowledge", version: TOOL_SURFACE_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.list().map(toMcpTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    try {
      const output = await registry.invoke(name, args ?? {});
      return textResult(output);
    } catch (err) {
      log.warn(`mcp.call_failed ${fields({ tool: name })}: ${describeError(err)}`);
      return textResult({ error: describeError(err) }, true);
    }
  });

  return server;
}

