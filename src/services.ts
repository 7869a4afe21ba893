import type { Settings } from "./config/settings.js";
import type { EmbeddingClient } from "./llm/embedding.js";
import type { LLMClient } from "./llm/client.js";
import { createOpenAIClient, createOpenAIEmbeddingClient } from "./llm/openai.js";
import type { Logger } from "./lib/logger.js";
import { AnswerGenerator } from "./rag/answer.js";
import { ChatService } from "./rag/chat.js";
import { LocalVectorStore } from "./retrieval/localStore.js";
import { createPineconeStore } from "./retrieval/pineconeStore.js";
import { Retriever } from "./retrieval/retrieve.js";
import type { VectorStore } from "./retrieval/types.js";

export interface Services {
  llm: LLMClient;
  embedder: EmbeddingClient;
  store: VectorStore;
  retriever: Retriever;
  chat: ChatService;
}

export function createVectorStore(settings: Settings): VectorStore {
  if (settings.vectorStore === "local") return new LocalVectorStore(settings.localIndexPath);
  return createPineconeStore(settings);
}

/**
 * Wire the serving pipeline from settings. Clients may be overridden, which tests and the CLI use.
 */
export function createServices(
  settings: Settings,
  logger: Logger,
  overrides: Partial<Pick<Services, "llm" | "embedder" | "store">> = {}
): Services {
  const llm = overrides.llm ?? createOpenAIClient(settings);
  const embedder = overrides.embedder ?? createOpenAIEmbeddingClient(settings);
  const store = overrides.store ?? createVectorStore(settings);
  const retriever = new Retriever(store, { dimension: settings.embeddingDimension, logger });
  const generator = new AnswerGenerator(llm, {
    assistantName: settings.assistantName,
    maxAnswerTokens: settings.maxAnswerTokens,
    maxGreetingTokens: settings.maxGreetingTokens,
    logger,
  });
  const chat = new ChatService(embedder, retriever, generator, {
    topK: settings.topK,
    minScore: settings.minScore,
    logger,
  });
  return { llm, embedder, store, retriever, chat };
}
