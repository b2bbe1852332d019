import { randomUUID } from "node:crypto";
import { Command, InvalidArgumentError } from "commander";
import { OpenAiAgentPolicy } from "./agent/openai-policy.js";
import type { AgentModelClient } from "./agent/openai-policy.js";
import { MemoryFirstPolicy } from "./agent/policy.js";
import type { AgentPolicy } from "./agent/policy.js";
import type { OrchestrationSession } from "./agent/session.js";
import { assertMemoryConfig, loadConfigFile, parseConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { createRuntime } from "./index.js";
import type { Runtime } from "./index.js";
import { initLogger, log } from "./logger.js";
import type { MemoryGateway } from "./memory/gateway.js";
import { SEARCH_DEFAULTS } from "./retriever.js";
import { MEMORY_SCOPES } from "./types.js";
import type { MemoryScope } from "./types.js";

interface GlobalOptions {
  config?: string;
  debug?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) throw new InvalidArgumentError("Not an integer.");
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) throw new InvalidArgumentError("Not a number.");
  return parsed;
}

function parseList(value: string): string[] {
  return value
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

function parseScope(value: string): MemoryScope {
  const scope = MEMORY_SCOPES.find((s) => s === value);
  if (!scope) throw new InvalidArgumentError(`Scope must be one of: ${MEMORY_SCOPES.join(", ")}.`);
  return scope;
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function requireMemory(runtime: Runtime): MemoryGateway {
  assertMemoryConfig(runtime.config);
  if (!runtime.memory) throw new ConfigurationError("memory backend not configured");
  return runtime.memory;
}

/** Never reaches a model; `--dry-run` only renders the first request. */
const offlineModelClient: AgentModelClient = {
  async createResponse() {
    throw new ConfigurationError("dry run does not call the model");
  },
};

/**
 * Register every `wargame` command on `program`. Each command builds its own
 * runtime from `--config` plus `overrides` and closes it when done.
 */
export function registerCli(program: Command): void {
  program
    .option("--config <path>", "JSON config file")
    .option("--debug", "Enable debug logging");

  async function withRuntime<T>(overrides: Record<string, unknown>, fn: (runtime: Runtime) => Promise<T>): Promise<T> {
    const globals = program.opts<GlobalOptions>();
    const fileConfig = await loadConfigFile(globals.config);
    const config = parseConfig({ ...fileConfig, ...(globals.debug ? { debug: true } : {}), ...overrides });
    initLogger(console, config.debug);
    const runtime = await createRuntime(config);
    try {
      return await fn(runtime);
    } finally {
      runtime.close();
    }
  }

  program
    .command("ingest")
    .description("Ingest every supported document under a directory into the index")
    .argument("<dir>", "Directory to scan")
    .option("--fake-embeddings", "Use deterministic offline embeddings")
    .option("--concurrency <n>", "Documents processed in parallel", parseInteger)
    .action(async (dir: string, options: { fakeEmbeddings?: boolean; concurrency?: number }) => {
      await withRuntime(options.fakeEmbeddings ? { fakeEmbeddings: true } : {}, async (runtime) => {
        const report = await runtime.ingestor.ingestDirectory(dir, { concurrency: options.concurrency });
        console.log(
          `Ingested ${report.documentCount} documents (${report.chunkCount} chunks, ${report.tokenCount} tokens); ${report.failed.length} failed`,
        );
        for (const f of report.failed) console.log(`  FAILED ${f.path}: ${f.reason}`);
        for (const w of report.warnings) console.log(`  WARN ${w.path} [${w.field}/${w.source}]: ${w.message}`);
        if (report.failed.length > 0) process.exitCode = 1;
      });
    });

  program
    .command("search")
    .description("Semantic search over the indexed corpus")
    .argument("<query>", "Search text")
    .option("--top-k <n>", "Maximum results", parseInteger, SEARCH_DEFAULTS.topK)
    .option("--min-score <score>", "Drop results scoring below this", parseNumber, SEARCH_DEFAULTS.minScore)
    .option("--collections <names>", "Comma-separated collection filter", parseList)
    .option("--fake-embeddings", "Use deterministic offline embeddings")
    .action(
      async (
        query: string,
        options: { topK: number; minScore: number; collections?: string[]; fakeEmbeddings?: boolean },
      ) => {
        await withRuntime(options.fakeEmbeddings ? { fakeEmbeddings: true } : {}, async (runtime) => {
          const hits = await runtime.retriever.search(query, {
            topK: options.topK,
            minScore: options.minScore,
            collections: options.collections,
          });
          if (hits.length === 0) {
            console.log("No results.");
            return;
          }
          for (const hit of hits) {
            console.log(`${hit.score.toFixed(3)}  ${hit.chunkId}  [${hit.metadata.collection}] ${hit.metadata.title}`);
            console.log(`       ${hit.text.slice(0, 200).replace(/\s+/g, " ")}`);
          }
        });
      },
    );

  program
    .command("span")
    .description("Print the chunks around a chunk of a document")
    .argument("<documentId>", "Document id")
    .argument("<center>", "Center chunk index", parseInteger)
    .option("--span <n>", "Chunks on each side", parseInteger, SEARCH_DEFAULTS.span)
    .action(async (documentId: string, center: number, options: { span: number }) => {
      await withRuntime({ fakeEmbeddings: true }, async (runtime) => {
        const chunks = await runtime.retriever.getSpan(documentId, center, options.span);
        for (const c of chunks) {
          console.log(`--- ${c.chunkId} (${c.chunkIndex + 1}/${c.chunkCount})`);
          console.log(c.text);
        }
      });
    });

  program
    .command("list-collections")
    .description("List collections that hold at least one document")
    .action(async () => {
      await withRuntime({ fakeEmbeddings: true }, async (runtime) => {
        const collections = await runtime.retriever.listCollections();
        if (collections.length === 0) console.log("No collections indexed.");
        for (const c of collections) console.log(`${c.name}: ${c.documentCount} documents (${c.description})`);
      });
    });

  program
    .command("health-check")
    .description("Report index health")
    .action(async () => {
      await withRuntime({ fakeEmbeddings: true }, async (runtime) => {
        const report = await runtime.retriever.healthCheck();
        console.log(`${report.status}: ${report.details}`);
        if (report.status === "error") process.exitCode = 1;
      });
    });

  const memory = program.command("memory").description("Long-term memory commands");

  memory
    .command("add")
    .description("Store a memory for a user")
    .argument("<text>", "Memory text")
    .requiredOption("--user-id <id>", "Owning user")
    .option("--scope <scope>", "user|scenario|agent", parseScope)
    .option("--tags <tags>", "Comma-separated tags", parseList)
    .option("--source <source>", "Where the memory came from", "cli")
    .action(async (text: string, options: { userId: string; scope?: MemoryScope; tags?: string[]; source: string }) => {
      await withRuntime({ fakeEmbeddings: true }, async (runtime) => {
        const result = await requireMemory(runtime).add({
          userId: options.userId,
          memory: text,
          scope: options.scope,
          tags: options.tags,
          source: options.source,
        });
        print(result);
      });
    });

  memory
    .command("search")
    .description("Search a user's memories")
    .argument("<query>", "Search text")
    .requiredOption("--user-id <id>", "Owning user")
    .option("--limit <n>", "Maximum results", parseInteger)
    .option("--scopes <scopes>", "Comma-separated scopes", (v: string) => parseList(v).map(parseScope))
    .action(async (query: string, options: { userId: string; limit?: number; scopes?: MemoryScope[] }) => {
      await withRuntime({ fakeEmbeddings: true }, async (runtime) => {
        print(await requireMemory(runtime).search(query, options.userId, options.limit, options.scopes));
      });
    });

  memory
    .command("list")
    .description("List a user's memories")
    .requiredOption("--user-id <id>", "Owning user")
    .option("--limit <n>", "Maximum results", parseInteger)
    .option("--scope <scope>", "user|scenario|agent", parseScope)
    .option("--tags <tags>", "Comma-separated tags", parseList)
    .action(async (options: { userId: string; limit?: number; scope?: MemoryScope; tags?: string[] }) => {
      await withRuntime({ fakeEmbeddings: true }, async (runtime) => {
        print(await requireMemory(runtime).list(options.userId, options.limit, options.scope, options.tags));
      });
    });

  memory
    .command("delete")
    .description("Delete a memory by id")
    .argument("<memoryId>", "Memory id")
    .action(async (memoryId: string) => {
      await withRuntime({ fakeEmbeddings: true }, async (runtime) => {
        print({ status: await requireMemory(runtime).delete(memoryId) });
      });
    });

  program
    .command("consolidate")
    .description("Run one memory consolidation pass")
    .option("--user-ids <ids>", "Comma-separated users; required unless the memory backend can list users", parseList)
    .option("--fake-embeddings", "Use deterministic offline embeddings")
    .action(async (options: { userIds?: string[]; fakeEmbeddings?: boolean }) => {
      await withRuntime(options.fakeEmbeddings ? { fakeEmbeddings: true } : {}, async (runtime) => {
        print(await requireMemory(runtime).consolidate(options.userIds));
      });
    });

  program
    .command("agent-run")
    .description("Answer a question with the tool-calling agent")
    .argument("<question>", "Question for the agent")
    .option("--user-id <id>", "User the session runs for", "cli-user")
    .option("--model <model>", "Agent model (overrides agentModel)")
    .option("--offline", "Use the scripted memory-first policy instead of a model")
    .option("--dry-run", "Print the first model request and exit")
    .option("--remember", "Store the final answer as an agent memory")
    .option("--fake-embeddings", "Use deterministic offline embeddings")
    .action(
      async (
        question: string,
        options: {
          userId: string;
          model?: string;
          offline?: boolean;
          dryRun?: boolean;
          remember?: boolean;
          fakeEmbeddings?: boolean;
        },
      ) => {
        const overrides = options.fakeEmbeddings || options.dryRun ? { fakeEmbeddings: true } : {};
        await withRuntime(overrides, async (runtime) => {
          if (options.dryRun) {
            const policy = new OpenAiAgentPolicy(offlineModelClient, runtime.tools, {
              model: options.model ?? runtime.config.agentModel,
              temperature: runtime.config.agentTemperature,
            });
            const session: OrchestrationSession = {
              correlationId: randomUUID(),
              userId: options.userId,
              question,
              iterationCount: 0,
              results: [],
              attempts: [],
              status: "running",
              state: "ITERATING",
            };
            print(policy.buildRequest(session));
            return;
          }

          let policy: AgentPolicy;
          if (options.offline) {
            policy = new MemoryFirstPolicy();
          } else if (!runtime.config.openaiApiKey) {
            log.info("agent-run: no OPENAI_API_KEY; using the memory-first policy");
            policy = new MemoryFirstPolicy();
          } else {
            policy = runtime.openAiPolicy(options.model);
          }

          const result = await runtime
            .orchestrator(policy, { rememberAnswer: options.remember === true })
            .run(question, { userId: options.userId });
          console.log(`status: ${result.status} (${result.iterations} tool calls)`);
          if (result.reason) console.log(`reason: ${result.reason}`);
          for (const entry of result.results) {
            const via = entry.toolName === entry.requestedTool ? "" : ` via ${entry.toolName}`;
            console.log(`  #${entry.iteration} ${entry.requestedTool}${via}: ${entry.ok ? "ok" : entry.error ?? "failed"}`);
          }
          if (result.answer) console.log(`\n${result.answer}`);
          if (result.status === "failed") process.exitCode = 1;
        });
      },
    );
}

export function buildProgram(version: string): Command {
  const program = new Command();
  program.name("wargame").description("Wargame doctrine retrieval, memory and agent tools").version(version);
  registerCli(program);
  return program;
}
