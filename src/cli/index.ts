#!/usr/bin/env node
import path from "path";
import { fileURLToPath } from "url";
import dotenv from "dotenv";
import { findEnvPath } from "../config/env.js";
import { loadSettings } from "../config/settings.js";
import { describeError } from "../errors.js";
import { ConsoleLogger } from "../lib/logger.js";
import { runAskCommand } from "./commands/ask.js";
import { runIngestCommand } from "./commands/ingest.js";
import { runStatsCommand } from "./commands/stats.js";
import { parseCli } from "./parse.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

dotenv.config({ path: findEnvPath(__dirname) });

export async function main(argv: string[]): Promise<void> {
  const parsed = parseCli(argv);

  // Ingestion loads its own settings so configuration errors land in its log file.
  if (parsed.command === "ingest") {
    await runIngestCommand(parsed);
    return;
  }

  const settings = loadSettings();
  if (parsed.command === "ask") {
    await runAskCommand(parsed, settings, new ConsoleLogger({ level: settings.logLevel }));
    return;
  }

  await runStatsCommand(settings);
}

try {
  await main(process.argv);
} catch (err: unknown) {
  process.stderr.write(`${describeError(err)}\n`);
  process.exitCode = 1;
}
