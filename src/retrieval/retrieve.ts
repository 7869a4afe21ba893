import { RetrievalError } from "../errors.js";
import type { Logger } from "../lib/logger.js";
import { NullLogger } from "../lib/logger.js";
import {
  parseChunkMetadata,
  type ScoredChunk,
  type SimilarityMetric,
  type VectorMatch,
  type VectorStore,
} from "./types.js";

export interface RetrieverOptions {
  dimension: number;
  logger?: Logger;
}

/**
 * Read-only nearest-neighbour lookup over the vector store.
 *
 * Results are ordered by score, highest first, and never longer than `k`. When fewer than `k`
 * chunks are indexed, all of them come back. Near-duplicates from overlapping chunks are not
 * removed.
 */
export class Retriever {
  private readonly dimension: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: VectorStore,
    options: RetrieverOptions
  ) {
    this.dimension = options.dimension;
    this.logger = options.logger ?? new NullLogger();
  }

  async retrieve(queryVector: number[], k: number, metric: SimilarityMetric = "cosine"): Promise<ScoredChunk[]> {
    if (metric !== "cosine") {
      throw new RetrievalError(`Unsupported similarity metric "${metric}"; the index uses cosine`);
    }
    if (!Number.isInteger(k) || k < 1) {
      throw new RetrievalError(`k must be a positive integer, got ${k}`);
    }
    if (queryVector.length !== this.dimension) {
      throw new RetrievalError(
        `Query vector has ${queryVector.length} components, index dimension is ${this.dimension}`
      );
    }

    let matches: VectorMatch[];
    try {
      matches = await this.store.query(queryVector, k);
    } catch (err) {
      if (err instanceof RetrievalError) throw err;
      throw new RetrievalError("Vector store query failed", { cause: err });
    }

    const results: ScoredChunk[] = [];
    for (const match of matches.slice(0, k)) {
      const chunk = parseChunkMetadata(match.id, match.metadata);
      if (!chunk) {
        this.logger.warn("Match missing metadata text, skipped", { id: match.id });
        continue;
      }
      results.push({ chunk, score: match.score });
    }
    results.sort((a, b) => b.score - a.score);
    this.logger.debug("Retrieved chunks", { count: results.length, k });
    return results;
  }
}
