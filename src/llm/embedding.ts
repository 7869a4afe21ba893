/**
 * Maps text to a fixed-length vector. Rejects with EmbeddingError.
 */
export interface EmbeddingClient {
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
}

/** Longest input sent to the embedding model, in characters. */
export const MAX_EMBED_INPUT = 8000;
