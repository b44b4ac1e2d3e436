#!/usr/bin/env node
import { config as loadDotEnv } from "dotenv";
import { loadConfig } from "../config.js";
import { createSoilAnalyzer } from "../engine/analyzer.js";
import { describeError } from "../errors.js";
import { createLogger } from "../logger.js";
import { createJsonFileResultStore } from "../storage/json-file-storage.js";
import type { RunnerOutput } from "./runner.js";
import { runSoilAnalysis } from "./runner.js";

async function readStdin(): Promise<string> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8").trim();
}

function writeOutput(payload: RunnerOutput): void {
  process.stdout.write(`${JSON.stringify(payload)}\n`);
}

async function main(): Promise<void> {
  loadDotEnv();
  const config = loadConfig();
  const logger = createLogger(config.logLevel, true);
  const analyzer = createSoilAnalyzer(config, { logger });

  const raw = await readStdin();
  const { output, exitCode } = await runSoilAnalysis(raw, {
    analyzer,
    createStore: (outDir) => createJsonFileResultStore({ rootDir: outDir })
  });
  writeOutput(output);
  process.exitCode = exitCode;
}

main().catch((error: unknown) => {
  writeOutput({ ok: false, error: describeError(error) });
  process.exitCode = 1;
});
