import { createHash } from "crypto";

export interface ChunkOptions {
  /** Words per chunk. */
  chunkSize?: number;
  /** Words shared by consecutive chunks. */
  overlap?: number;
}

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 50;

/**
 * Split text into overlapping word windows. A window starts every `chunkSize - overlap` words,
 * so the last chunk may be shorter, and may lie entirely inside the previous one's overlap.
 */
export function chunkWords(text: string, opts: ChunkOptions = {}): string[] {
  const chunkSize = Math.max(1, opts.chunkSize ?? DEFAULT_CHUNK_SIZE);
  const overlap = Math.max(0, opts.overlap ?? DEFAULT_CHUNK_OVERLAP);
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  const step = Math.max(1, chunkSize - overlap);
  const chunks: string[] = [];
  for (let i = 0; i < words.length; i += step) {
    chunks.push(words.slice(i, i + chunkSize).join(" "));
  }
  return chunks;
}

/** Stable document id: the MD5 of the source key. */
export function documentId(sourceKey: string): string {
  return createHash("md5").update(sourceKey).digest("hex");
}

export function chunkId(docId: string, index: number): string {
  return `${docId}_chunk_${index}`;
}
