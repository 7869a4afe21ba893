import { createHash } from "crypto";
import { readFile, writeFile, mkdir } from "fs/promises";
import path from "path";

export interface SourceIndexEntry {
  docId: string;
  contentHash: string;
  chunkCount: number;
}

/** What was last ingested for each source key. Lets unchanged sermons be skipped. */
export interface SourceIndexData {
  entries: Record<string, SourceIndexEntry>;
  lastUpdated: string;
}

export function emptySourceIndex(): SourceIndexData {
  return { entries: {}, lastUpdated: new Date().toISOString() };
}

/** SHA-256 hex digest of the content. */
export function computeContentHash(content: string | Buffer): string {
  const data = typeof content === "string" ? Buffer.from(content, "utf-8") : content;
  return createHash("sha256").update(data).digest("hex");
}

function isEntry(value: unknown): value is SourceIndexEntry {
  if (!value || typeof value !== "object") return false;
  const e = value as Partial<SourceIndexEntry>;
  return typeof e.docId === "string" && typeof e.contentHash === "string" && typeof e.chunkCount === "number";
}

/**
 * Load the source index. A missing or unreadable file yields an empty index, so the next run
 * re-ingests everything (ids are stable, so that only overwrites).
 */
export async function loadSourceIndex(filePath: string): Promise<SourceIndexData> {
  try {
    const raw = await readFile(filePath, "utf-8");
    const data = JSON.parse(raw) as Partial<SourceIndexData>;
    if (!data || !data.entries || typeof data.entries !== "object") return emptySourceIndex();
    const entries: Record<string, SourceIndexEntry> = {};
    for (const [key, value] of Object.entries(data.entries)) {
      if (isEntry(value)) entries[key] = value;
    }
    return {
      entries,
      lastUpdated: typeof data.lastUpdated === "string" ? data.lastUpdated : new Date().toISOString(),
    };
  } catch {
    return emptySourceIndex();
  }
}

export async function saveSourceIndex(filePath: string, data: SourceIndexData): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const full: SourceIndexData = {
    entries: data.entries,
    lastUpdated: new Date().toISOString(),
  };
  await writeFile(filePath, JSON.stringify(full, null, 2), "utf-8");
}

/**
 * True when the source is new or its content hash changed.
 */
export function needsProcessing(index: SourceIndexData, key: string, contentHash: string): boolean {
  const entry = index.entries[key];
  if (!entry) return true;
  return entry.contentHash !== contentHash;
}
