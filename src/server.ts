#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfigFile, parseConfig } from "./config.js";
import { describeError } from "./errors.js";
import { createRuntime } from "./index.js";
import { fields, initLogger, log } from "./logger.js";
import { createMcpServer, stderrSink } from "./mcp.js";

async function main(): Promise<void> {
  const config = parseConfig(await loadConfigFile(process.env.WARGAME_CONFIG));
  initLogger(stderrSink, config.debug);
  const runtime = await createRuntime(config);
  runtime.memory?.startConsolidation(config.consolidationIntervalMs);

  const server = createMcpServer(runtime.tools);
  const shutdown = () => {
    runtime.close();
    server.close().catch((err: unknown) => log.warn(`mcp.close_failed: ${describeError(err)}`));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await server.connect(new StdioServerTransport());
  log.info(`mcp server ready ${fields({ tools: runtime.tools.list().length, index: config.indexPath })}`);
}

main().catch((err: unknown) => {
  console.error(`error: ${describeError(err)}`);
  process.exitCode = 1;
});
