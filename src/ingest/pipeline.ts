import { IngestionError, describeError } from "../errors.js";
import type { EmbeddingClient } from "../llm/embedding.js";
import type { Logger } from "../lib/logger.js";
import { toChunkMetadata, type VectorRecord, type VectorStore } from "../retrieval/types.js";
import { chunkId, chunkWords, documentId, type ChunkOptions } from "./chunk.js";
import { cleanContent } from "./clean.js";
import {
  computeContentHash,
  emptySourceIndex,
  loadSourceIndex,
  needsProcessing,
  saveSourceIndex,
  type SourceIndexData,
} from "./sourceIndex.js";
import type { SermonSource } from "./sources.js";

/** Sermons shorter than this after cleaning are not indexed. */
export const MIN_CONTENT_LENGTH = 50;

export interface IngestDeps {
  embedder: EmbeddingClient;
  store: VectorStore;
  logger: Logger;
  /** Where change-detection state lives; null keeps it in memory for this run only. */
  sourceIndexPath: string | null;
}

export interface IngestOptions extends ChunkOptions {
  /** Re-embed sources whose content hash is unchanged. */
  force?: boolean;
}

export interface IngestFailure {
  key: string;
  title: string;
  error: string;
}

export interface IngestResult {
  sources: number;
  skipped: number;
  tooShort: number;
  chunks: number;
  upserted: number;
  removed: number;
  failed: IngestFailure[];
  totalRecords: number;
}

interface PreparedSource {
  source: SermonSource;
  docId: string;
  contentHash: string;
  records: VectorRecord[];
}

async function checkStore(store: VectorStore, dimension: number): Promise<void> {
  const info = await store.describe();
  if (info.metric !== "cosine") {
    throw new IngestionError(`Vector store uses the ${info.metric} metric; cosine is required`);
  }
  if (info.dimension !== null && info.dimension !== dimension) {
    throw new IngestionError(`Vector store dimension is ${info.dimension}, embeddings have ${dimension}`);
  }
}

/**
 * Clean, chunk, embed and upsert sermons. Chunk ids are derived from the source key and the
 * chunk position, so running twice over the same sources leaves the record count unchanged.
 *
 * A source that fails to embed is reported in `failed` and the rest continue. A store failure
 * aborts the run with IngestionError; the source index is only advanced for written sources.
 */
export async function ingestSources(
  sources: SermonSource[],
  deps: IngestDeps,
  options: IngestOptions = {}
): Promise<IngestResult> {
  const { embedder, store, logger } = deps;
  if (sources.length === 0) {
    throw new IngestionError("No sermons to ingest");
  }

  try {
    await checkStore(store, embedder.dimension);
  } catch (err) {
    if (err instanceof IngestionError) throw err;
    throw new IngestionError("Could not describe the vector store", { cause: err });
  }

  const index: SourceIndexData = deps.sourceIndexPath
    ? await loadSourceIndex(deps.sourceIndexPath)
    : emptySourceIndex();

  const result: IngestResult = {
    sources: sources.length,
    skipped: 0,
    tooShort: 0,
    chunks: 0,
    upserted: 0,
    removed: 0,
    failed: [],
    totalRecords: 0,
  };
  const prepared: PreparedSource[] = [];
  const seenKeys = new Set<string>();

  for (const source of sources) {
    // Two sources with one key would write the same chunk ids.
    if (seenKeys.has(source.key)) {
      const error = `Duplicate source key "${source.key}"; another sermon in this run already uses it`;
      logger.error("Duplicate sermon skipped", { title: source.title, key: source.key });
      result.failed.push({ key: source.key, title: source.title, error });
      continue;
    }
    seenKeys.add(source.key);

    const content = cleanContent(source.content);
    if (content.length < MIN_CONTENT_LENGTH) {
      logger.warn("Content too short, skipped", { title: source.title, length: content.length });
      result.tooShort++;
      continue;
    }
    const contentHash = computeContentHash(content);
    if (!options.force && !needsProcessing(index, source.key, contentHash)) {
      result.skipped++;
      continue;
    }

    const docId = documentId(source.key);
    const texts = chunkWords(content, options);
    try {
      const records: VectorRecord[] = [];
      for (let i = 0; i < texts.length; i++) {
        const text = texts[i];
        const values = await embedder.embed(text);
        const id = chunkId(docId, i);
        records.push({
          id,
          values,
          metadata: toChunkMetadata({
            id,
            text,
            title: source.title,
            source: source.url,
            category: source.category,
            chunkIndex: i,
            totalChunks: texts.length,
          }),
        });
      }
      prepared.push({ source, docId, contentHash, records });
      result.chunks += records.length;
      logger.debug("Sermon embedded", { title: source.title, chunks: records.length });
    } catch (err) {
      const error = describeError(err);
      logger.error("Could not embed sermon", { title: source.title, key: source.key, error });
      result.failed.push({ key: source.key, title: source.title, error });
    }
  }

  const records = prepared.flatMap((p) => p.records);
  if (records.length > 0) {
    try {
      await store.upsert(records);
    } catch (err) {
      throw new IngestionError(`Upserting ${records.length} vectors failed`, { cause: err });
    }
    result.upserted = records.length;
    logger.info("Upserted vectors", { count: records.length });
  }

  // A sermon that shrank leaves its old trailing chunks behind.
  const stale: string[] = [];
  for (const p of prepared) {
    const previous = index.entries[p.source.key];
    if (previous && previous.docId === p.docId) {
      for (let i = p.records.length; i < previous.chunkCount; i++) stale.push(chunkId(p.docId, i));
    }
    index.entries[p.source.key] = { docId: p.docId, contentHash: p.contentHash, chunkCount: p.records.length };
  }
  if (stale.length > 0) {
    try {
      await store.delete(stale);
    } catch (err) {
      throw new IngestionError(`Removing ${stale.length} stale vectors failed`, { cause: err });
    }
    result.removed = stale.length;
    logger.info("Removed stale vectors", { count: stale.length });
  }

  if (deps.sourceIndexPath && prepared.length > 0) {
    await saveSourceIndex(deps.sourceIndexPath, index);
  }

  try {
    result.totalRecords = (await store.describe()).totalRecords;
  } catch (err) {
    logger.warn("Could not read vector count", { error: describeError(err) });
  }

  logger.info("Ingestion finished", {
    sources: result.sources,
    skipped: result.skipped,
    tooShort: result.tooShort,
    chunks: result.chunks,
    removed: result.removed,
    failed: result.failed.length,
    totalRecords: result.totalRecords,
  });
  return result;
}
