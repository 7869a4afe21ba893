import { mkdir, readFile, stat, writeFile } from "fs/promises";
import path from "path";
import { RetrievalError } from "../errors.js";
import { cosineSimilarity } from "./similarity.js";
import type { VectorMatch, VectorRecord, VectorStore, VectorStoreInfo } from "./types.js";

interface StoredIndex {
  version: 1;
  dimension: number | null;
  records: VectorRecord[];
  updatedAt: string;
}

function emptyIndex(): StoredIndex {
  return { version: 1, dimension: null, records: [], updatedAt: new Date().toISOString() };
}

function isRecord(value: unknown): value is VectorRecord {
  if (!value || typeof value !== "object") return false;
  const r = value as Partial<VectorRecord>;
  return (
    typeof r.id === "string" &&
    Array.isArray(r.values) &&
    r.values.every((v) => typeof v === "number") &&
    !!r.metadata &&
    typeof r.metadata === "object"
  );
}

function isMissing(err: unknown): boolean {
  return !!err && typeof err === "object" && "code" in err && err.code === "ENOENT";
}

/**
 * Brute-force cosine store kept in memory and, when a file path is given, mirrored to a JSON file.
 * Used for local development and tests; the hosted index is used in production.
 *
 * The file is re-read whenever its modification time or size changes, so a running server picks
 * up vectors written by a separate ingestion process.
 */
export class LocalVectorStore implements VectorStore {
  private index: StoredIndex | null = null;
  private loadedStamp: string | null = null;

  constructor(private readonly filePath: string | null = null) {}

  private async fileStamp(filePath: string): Promise<string | null> {
    try {
      const info = await stat(filePath);
      return `${info.mtimeMs}:${info.size}`;
    } catch (err: unknown) {
      if (isMissing(err)) return null;
      throw new RetrievalError(`Could not stat local index ${filePath}`, { cause: err });
    }
  }

  private async load(): Promise<StoredIndex> {
    if (!this.filePath) {
      this.index ??= emptyIndex();
      return this.index;
    }
    const stamp = await this.fileStamp(this.filePath);
    if (this.index && stamp === this.loadedStamp) return this.index;
    if (stamp === null) {
      this.index = emptyIndex();
      this.loadedStamp = null;
      return this.index;
    }

    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err: unknown) {
      throw new RetrievalError(`Could not read local index ${this.filePath}`, { cause: err });
    }
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new RetrievalError(`Local index ${this.filePath} is not valid JSON`, { cause: err });
    }
    const parsed = data && typeof data === "object" ? (data as Partial<StoredIndex>) : {};
    const records = Array.isArray(parsed.records) ? parsed.records.filter(isRecord) : [];
    this.index = {
      version: 1,
      dimension: typeof parsed.dimension === "number" ? parsed.dimension : records[0]?.values.length ?? null,
      records,
      updatedAt: typeof parsed.updatedAt === "string" ? parsed.updatedAt : new Date().toISOString(),
    };
    this.loadedStamp = stamp;
    return this.index;
  }

  private async save(index: StoredIndex): Promise<void> {
    index.updatedAt = new Date().toISOString();
    if (!this.filePath) return;
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(index), "utf-8");
    this.loadedStamp = await this.fileStamp(this.filePath);
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) return;
    const index = await this.load();
    const dimension = index.dimension ?? records[0]?.values.length ?? null;
    for (const record of records) {
      if (record.values.length !== dimension) {
        throw new RetrievalError(
          `Vector ${record.id} has ${record.values.length} components, index dimension is ${dimension}`
        );
      }
    }
    index.dimension = dimension;
    const positions = new Map(index.records.map((r, i) => [r.id, i]));
    for (const record of records) {
      const entry: VectorRecord = { id: record.id, values: [...record.values], metadata: { ...record.metadata } };
      const existing = positions.get(record.id);
      if (existing !== undefined) {
        index.records[existing] = entry;
      } else {
        positions.set(record.id, index.records.length);
        index.records.push(entry);
      }
    }
    await this.save(index);
  }

  async query(vector: number[], topK: number): Promise<VectorMatch[]> {
    const index = await this.load();
    if (index.records.length === 0) return [];
    if (index.dimension !== null && vector.length !== index.dimension) {
      throw new RetrievalError(`Query has ${vector.length} components, index dimension is ${index.dimension}`);
    }
    return index.records
      .map((r) => ({ id: r.id, score: cosineSimilarity(vector, r.values), metadata: r.metadata }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }

  async describe(): Promise<VectorStoreInfo> {
    const index = await this.load();
    return { dimension: index.dimension, metric: "cosine", totalRecords: index.records.length };
  }

  async delete(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    const index = await this.load();
    const drop = new Set(ids);
    const before = index.records.length;
    index.records = index.records.filter((r) => !drop.has(r.id));
    if (index.records.length !== before) await this.save(index);
  }
}
