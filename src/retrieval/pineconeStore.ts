import { Pinecone, type PineconeRecord, type RecordMetadata } from "@pinecone-database/pinecone";
import type { Settings } from "../config/settings.js";
import { ConfigurationError, RetrievalError } from "../errors.js";
import { withTimeout } from "../lib/timeout.js";
import type { SimilarityMetric, VectorMatch, VectorRecord, VectorStore, VectorStoreInfo } from "./types.js";

/** The slice of the Pinecone index client this store uses. */
export interface PineconeIndexClient {
  upsert(records: PineconeRecord<RecordMetadata>[]): Promise<void>;
  query(options: {
    vector: number[];
    topK: number;
    includeMetadata: boolean;
  }): Promise<{ matches?: Array<{ id: string; score?: number; metadata?: RecordMetadata }> }>;
  deleteMany(ids: string[]): Promise<void>;
  describeIndexStats(): Promise<{ dimension?: number; totalRecordCount?: number }>;
}

export interface PineconeVectorStoreOptions {
  indexName: string;
  timeoutMs: number;
  /** Metric the index was created with; read from the control plane when available. */
  describeMetric?: () => Promise<string | undefined>;
}

const UPSERT_BATCH_SIZE = 100;

function toMetric(value: string | undefined): SimilarityMetric {
  if (value === "euclidean" || value === "dotproduct") return value;
  return "cosine";
}

export class PineconeVectorStore implements VectorStore {
  constructor(
    private readonly index: PineconeIndexClient,
    private readonly options: PineconeVectorStoreOptions
  ) {}

  private call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    const { indexName, timeoutMs } = this.options;
    return withTimeout(
      run(),
      timeoutMs,
      () => new RetrievalError(`Pinecone ${operation} on "${indexName}" timed out after ${timeoutMs}ms`)
    ).catch((err: unknown) => {
      if (err instanceof RetrievalError) throw err;
      throw new RetrievalError(`Pinecone ${operation} on "${indexName}" failed`, { cause: err });
    });
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    for (let i = 0; i < records.length; i += UPSERT_BATCH_SIZE) {
      const batch = records.slice(i, i + UPSERT_BATCH_SIZE);
      await this.call("upsert", () =>
        this.index.upsert(batch.map((r) => ({ id: r.id, values: r.values, metadata: r.metadata })))
      );
    }
  }

  async query(vector: number[], topK: number): Promise<VectorMatch[]> {
    const res = await this.call("query", () => this.index.query({ vector, topK, includeMetadata: true }));
    return (res.matches ?? []).map((m) => ({ id: m.id, score: m.score ?? 0, metadata: m.metadata }));
  }

  async delete(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    await this.call("delete", () => this.index.deleteMany(ids));
  }

  async describe(): Promise<VectorStoreInfo> {
    const stats = await this.call("describeIndexStats", () => this.index.describeIndexStats());
    const metric = this.options.describeMetric
      ? toMetric(await this.call("describeIndex", this.options.describeMetric))
      : "cosine";
    return {
      dimension: stats.dimension ?? null,
      metric,
      totalRecords: stats.totalRecordCount ?? 0,
    };
  }
}

export function createPineconeStore(
  settings: Pick<Settings, "pineconeApiKey" | "pineconeIndex" | "requestTimeoutMs">
): PineconeVectorStore {
  if (!settings.pineconeApiKey) {
    throw new ConfigurationError("PINECONE_API_KEY is required for the Pinecone vector store");
  }
  const pc = new Pinecone({ apiKey: settings.pineconeApiKey });
  const indexName = settings.pineconeIndex;
  return new PineconeVectorStore(pc.index(indexName), {
    indexName,
    timeoutMs: settings.requestTimeoutMs,
    describeMetric: async () => (await pc.describeIndex(indexName)).metric,
  });
}
