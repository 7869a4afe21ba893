import { existsSync } from "fs";
import path from "path";
import { loadLogSettings, loadSettings, type Settings } from "../../config/settings.js";
import { IngestionError, describeError } from "../../errors.js";
import { ingestSources, type IngestDeps, type IngestFailure, type IngestResult } from "../../ingest/pipeline.js";
import { loadUrlList, scrapeSermonPages } from "../../ingest/scrape.js";
import {
  loadCatalog,
  loadSourceFolder,
  parseCatalog,
  readCatalogData,
  saveCatalog,
  type SermonSource,
} from "../../ingest/sources.js";
import { watchTranscripts } from "../../ingest/watcher.js";
import type { EmbeddingClient } from "../../llm/embedding.js";
import { createOpenAIEmbeddingClient } from "../../llm/openai.js";
import { ConsoleLogger, JsonlFileLogger, TeeLogger, type Logger } from "../../lib/logger.js";
import type { VectorStore } from "../../retrieval/types.js";
import { createVectorStore } from "../../services.js";
import type { ParsedCli } from "../parse.js";

export const INGEST_LOG_FILE = "ingestion.log.jsonl";

export interface IngestCommandOptions {
  env?: NodeJS.ProcessEnv;
  consoleLogger?: Logger;
  embedder?: EmbeddingClient;
  store?: VectorStore;
  fetchImpl?: typeof fetch;
}

interface CollectedSources {
  sources: SermonSource[];
  /** Pages from --urls that could not be fetched. */
  pageFailures: IngestFailure[];
}

function stringFlag(cli: ParsedCli, name: string): string | null {
  const value = cli.flags[name];
  return typeof value === "string" ? value : null;
}

async function collectSources(
  cli: ParsedCli,
  settings: Settings,
  logger: Logger,
  fetchImpl?: typeof fetch
): Promise<CollectedSources> {
  const catalog = stringFlag(cli, "catalog");
  const dir = stringFlag(cli, "dir");
  const urls = stringFlag(cli, "urls");
  const sources: SermonSource[] = [];
  const pageFailures: IngestFailure[] = [];
  const catalogPath = catalog ?? settings.catalogPath;

  if (urls) {
    const pages = await loadUrlList(urls);
    const existing = await readCatalogData(catalogPath);
    const scraped = await scrapeSermonPages(pages, existing, {
      logger,
      timeoutMs: settings.requestTimeoutMs,
      fetchImpl,
    });
    if (scraped.added.length > 0) {
      await saveCatalog(catalogPath, scraped.catalog);
      logger.info(`Saved ${scraped.added.length} new sermons to ${catalogPath}`);
    }
    const fromCatalog = parseCatalog(scraped.catalog);
    logger.info(`Loaded ${fromCatalog.length} sermons from ${catalogPath}`);
    sources.push(...fromCatalog);
    pageFailures.push(...scraped.failed);
  } else if (catalog || !dir) {
    if (!catalog && !existsSync(catalogPath)) {
      throw new IngestionError(`No sermon catalog at ${catalogPath}. Pass --catalog <file>, --dir <folder> or --urls <file>.`);
    }
    const fromCatalog = await loadCatalog(catalogPath);
    logger.info(`Loaded ${fromCatalog.length} sermons from ${catalogPath}`);
    sources.push(...fromCatalog);
  }
  if (dir) {
    const fromDir = await loadSourceFolder(path.resolve(dir), logger);
    logger.info(`Loaded ${fromDir.length} transcripts from ${dir}`);
    sources.push(...fromDir);
  }
  return { sources, pageFailures };
}

function printSummary(result: IngestResult, pageFailures: number): void {
  process.stdout.write(
    `Sermons:       ${result.sources}\n` +
      `Unchanged:     ${result.skipped}\n` +
      `Too short:     ${result.tooShort}\n` +
      `Chunks:        ${result.upserted}\n` +
      `Stale removed: ${result.removed}\n` +
      `Failed:        ${result.failed.length}\n` +
      (pageFailures > 0 ? `Pages failed:  ${pageFailures}\n` : "") +
      `Total vectors: ${result.totalRecords}\n`
  );
}

/**
 * One ingestion run. The JSONL artifact under LOG_DIR is opened before anything else, so every
 * log line and every failure, configuration errors included, ends up in it. Any failure makes
 * the command reject so the process exits non-zero.
 */
export async function runIngestCommand(cli: ParsedCli, options: IngestCommandOptions = {}): Promise<void> {
  const env = options.env ?? process.env;
  const { logDir, logLevel } = loadLogSettings(env);
  const fileLogger = new JsonlFileLogger(path.join(logDir, INGEST_LOG_FILE), { level: logLevel });
  const logger = new TeeLogger(options.consoleLogger ?? new ConsoleLogger({ level: logLevel }), fileLogger);

  try {
    const settings = loadSettings(env);
    const deps: IngestDeps = {
      embedder: options.embedder ?? createOpenAIEmbeddingClient(settings),
      store: options.store ?? createVectorStore(settings),
      logger,
      sourceIndexPath: settings.sourceIndexPath,
    };

    logger.info("Starting ingestion", { store: settings.vectorStore, force: cli.flags.force === true });
    const { sources, pageFailures } = await collectSources(cli, settings, logger, options.fetchImpl);
    const result = await ingestSources(sources, deps, { force: cli.flags.force === true });
    printSummary(result, pageFailures.length);
    const failed = result.failed.length + pageFailures.length;
    if (failed > 0) {
      throw new IngestionError(`${failed} sermon(s) could not be ingested`);
    }

    if (cli.flags.watch === true) {
      const dir = stringFlag(cli, "dir");
      if (!dir) throw new IngestionError("--watch requires --dir <folder>");
      const watcher = watchTranscripts(path.resolve(dir), deps);
      await new Promise<void>((resolve) => {
        process.once("SIGINT", resolve);
        process.once("SIGTERM", resolve);
      });
      await watcher.close();
    }
  } catch (err) {
    logger.error("Ingestion failed", { error: describeError(err) });
    throw err;
  } finally {
    await fileLogger.flush();
  }
}
