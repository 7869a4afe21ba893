export type SimilarityMetric = "cosine" | "euclidean" | "dotproduct";

/**
 * Metadata stored with every vector. Key names match the records already in the
 * hosted index, hence the snake_case.
 */
export type ChunkMetadata = {
  text: string;
  title: string;
  url: string;
  category: string;
  chunk_index: number;
  total_chunks: number;
};

export interface VectorRecord {
  id: string;
  values: number[];
  metadata: ChunkMetadata;
}

export interface VectorMatch {
  id: string;
  score: number;
  metadata: unknown;
}

export interface VectorStoreInfo {
  /** null when the store is empty and has no fixed dimension yet. */
  dimension: number | null;
  metric: SimilarityMetric;
  totalRecords: number;
}

/**
 * Nearest-neighbour store over chunk embeddings. Upserts replace records with the same id.
 */
export interface VectorStore {
  upsert(records: VectorRecord[]): Promise<void>;
  /** Up to topK matches, highest score first. */
  query(vector: number[], topK: number): Promise<VectorMatch[]>;
  /** Remove records by id. Unknown ids are ignored. */
  delete(ids: string[]): Promise<void>;
  describe(): Promise<VectorStoreInfo>;
}

/** A chunk of sermon text as the rest of the service sees it. */
export interface DocumentChunk {
  id: string;
  text: string;
  title: string;
  source: string;
  category: string;
  chunkIndex: number;
  totalChunks: number;
}

export interface ScoredChunk {
  chunk: DocumentChunk;
  score: number;
}

/**
 * Validate metadata coming back from a store. Returns null when there is no usable text.
 */
export function parseChunkMetadata(id: string, raw: unknown): DocumentChunk | null {
  if (!raw || typeof raw !== "object") return null;
  const data = raw as Record<string, unknown>;
  if (typeof data.text !== "string" || !data.text.trim()) return null;
  return {
    id,
    text: data.text,
    title: typeof data.title === "string" && data.title ? data.title : "Sermon",
    source: typeof data.url === "string" ? data.url : "",
    category: typeof data.category === "string" && data.category ? data.category : "General",
    chunkIndex: typeof data.chunk_index === "number" ? data.chunk_index : 0,
    totalChunks: typeof data.total_chunks === "number" ? data.total_chunks : 1,
  };
}

export function toChunkMetadata(chunk: DocumentChunk): ChunkMetadata {
  return {
    text: chunk.text,
    title: chunk.title,
    url: chunk.source,
    category: chunk.category,
    chunk_index: chunk.chunkIndex,
    total_chunks: chunk.totalChunks,
  };
}
