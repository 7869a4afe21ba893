import path from "path";
import chokidar, { type FSWatcher } from "chokidar";
import { describeError } from "../errors.js";
import { isAllowedExt } from "../lib/fileTypes.js";
import { ingestSources, type IngestDeps, type IngestResult } from "./pipeline.js";
import { loadSourceFile } from "./sources.js";

export interface TranscriptWatcher {
  close(): Promise<void>;
}

/**
 * Re-ingest a transcript whenever it is added or changed under `sourceDir`.
 * Changes to the same file are handled one at a time, in order.
 */
export function watchTranscripts(
  sourceDir: string,
  deps: IngestDeps,
  onIngested?: (file: string, result: IngestResult) => void
): TranscriptWatcher {
  const { logger } = deps;
  let queue: Promise<void> = Promise.resolve();

  async function processFile(fullPath: string): Promise<void> {
    if (!isAllowedExt(path.extname(fullPath))) return;
    const rel = path.relative(sourceDir, fullPath).split(path.sep).join("/");
    try {
      const source = await loadSourceFile(fullPath, sourceDir, logger);
      if (!source) return;
      const result = await ingestSources([source], deps);
      if (result.upserted > 0) logger.info(`Transcript changed: ${rel} -> re-indexed`, { chunks: result.upserted });
      onIngested?.(rel, result);
    } catch (err) {
      logger.error(`Could not re-index ${rel}`, { error: describeError(err) });
    }
  }

  function schedule(fullPath: string): void {
    queue = queue.then(() => processFile(fullPath));
  }

  const watcher: FSWatcher = chokidar.watch(sourceDir, {
    ignored: /(^|[\/\\])\../,
    persistent: true,
    ignoreInitial: true,
    awaitWriteFinish: { stabilityThreshold: 500 },
  });

  watcher.on("add", schedule);
  watcher.on("change", schedule);
  watcher.on("error", (err) => {
    logger.error("Transcript watcher error", { error: describeError(err) });
  });

  logger.info(`Watching transcript folder: ${sourceDir}`);

  return {
    async close() {
      await watcher.close();
      await queue;
      logger.info("Stopped watching transcript folder");
    },
  };
}
