import { loadSettings, type Settings } from "../config/settings.js";
import { EmbeddingError, GenerationError } from "../errors.js";
import type { CompletionOptions, LLMClient, LLMMessage } from "../llm/client.js";
import type { EmbeddingClient } from "../llm/embedding.js";
import { LocalVectorStore } from "../retrieval/localStore.js";
import { chunkId, documentId } from "../ingest/chunk.js";
import type { ChunkMetadata } from "../retrieval/types.js";

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Deterministic bag-of-words embedder: each token adds 1 to the bucket its hash lands in.
 * Identical text gives identical vectors; texts sharing words score higher.
 */
export class HashingEmbedder implements EmbeddingClient {
  readonly calls: string[] = [];

  constructor(readonly dimension: number = 384) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const tokens = tokenize(text);
    if (tokens.length === 0) throw new EmbeddingError("Cannot embed empty text");
    const vec: number[] = new Array<number>(this.dimension).fill(0);
    for (const t of tokens) {
      const bucket = fnv1a(t) % this.dimension;
      vec[bucket] = (vec[bucket] ?? 0) + 1;
    }
    return vec;
  }
}

export interface RecordedCompletion {
  messages: LLMMessage[];
  options?: CompletionOptions;
}

/** Scripted LLM: returns `reply(messages)` or rejects with GenerationError when `fail` is set. */
export class FakeLLM implements LLMClient {
  readonly calls: RecordedCompletion[] = [];
  fail = false;

  constructor(private readonly reply: (messages: LLMMessage[]) => string = () => "A grounded answer.") {}

  async complete(messages: LLMMessage[], options?: CompletionOptions): Promise<string> {
    this.calls.push({ messages, options });
    if (this.fail) throw new GenerationError("LLM unavailable");
    return this.reply(messages);
  }
}

export function testSettings(overrides: Record<string, string> = {}): Settings {
  return loadSettings({
    OPENAI_API_KEY: "test-openai-key",
    VECTOR_STORE: "local",
    LOG_LEVEL: "error",
    ...overrides,
  });
}

export interface SeedSermon {
  url: string;
  title: string;
  category?: string;
  chunks: string[];
}

/** Fill an in-memory store with pre-chunked sermons embedded by `embedder`. */
export async function seedStore(embedder: EmbeddingClient, sermons: SeedSermon[]): Promise<LocalVectorStore> {
  const store = new LocalVectorStore();
  for (const sermon of sermons) {
    const docId = documentId(sermon.url);
    const records = await Promise.all(
      sermon.chunks.map(async (text, i) => {
        const metadata: ChunkMetadata = {
          text,
          title: sermon.title,
          url: sermon.url,
          category: sermon.category ?? "General",
          chunk_index: i,
          total_chunks: sermon.chunks.length,
        };
        return { id: chunkId(docId, i), values: await embedder.embed(text), metadata };
      })
    );
    await store.upsert(records);
  }
  return store;
}
