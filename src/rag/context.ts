import type { ScoredChunk } from "../retrieval/types.js";
import type { SourceLink } from "./prompts.js";

export const CONTEXT_SEPARATOR = "\n\n---\n\n";

/** Maximum number of source links attached to one answer. */
export const MAX_SOURCE_LINKS = 3;

export function buildContext(chunks: ScoredChunk[]): string {
  return chunks.map((c) => c.chunk.text).join(CONTEXT_SEPARATOR);
}

/**
 * Distinct sources behind the given chunks, in retrieval order. Chunks without a URL are skipped.
 */
export function collectSources(chunks: ScoredChunk[], limit: number = MAX_SOURCE_LINKS): SourceLink[] {
  const seen = new Set<string>();
  const out: SourceLink[] = [];
  for (const { chunk } of chunks) {
    if (!chunk.source || seen.has(chunk.source)) continue;
    seen.add(chunk.source);
    out.push({ title: chunk.title, url: chunk.source, category: chunk.category });
    if (out.length >= limit) break;
  }
  return out;
}
