#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { buildProgram } from "./cli.js";
import { describeError } from "./errors.js";

const PackageSchema = z.object({ version: z.string().optional() });

async function getPackageVersion(): Promise<string> {
  try {
    const raw = await readFile(new URL("../../package.json", import.meta.url), "utf-8");
    const parsed = PackageSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data.version ?? "unknown" : "unknown";
  } catch {
    return "unknown";
  }
}

const program = buildProgram(await getPackageVersion());
program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`error: ${describeError(err)}`);
  process.exitCode = 1;
});
