import type { EmbeddingClient } from "../llm/embedding.js";
import type { Logger } from "../lib/logger.js";
import { NullLogger } from "../lib/logger.js";
import type { Retriever } from "../retrieval/retrieve.js";
import type { ScoredChunk } from "../retrieval/types.js";
import type { AnswerGenerator, AnswerKind } from "./answer.js";
import { classifyMessage, type MessageIntent } from "./intent.js";
import type { SourceLink } from "./prompts.js";

export interface ChatReply {
  answer: string;
  sources: SourceLink[];
  intent: MessageIntent;
  kind: AnswerKind;
  /** Chunks that passed the relevance filter, for logging and tests. */
  retrieved: ScoredChunk[];
}

export interface ChatServiceOptions {
  topK: number;
  /** Matches at or below this score are dropped before generation. */
  minScore: number;
  logger?: Logger;
}

/**
 * Sequences one chat turn: classify, embed, retrieve, filter by score, generate.
 * Embedding and retrieval errors propagate; generation errors are absorbed by the generator.
 */
export class ChatService {
  private readonly logger: Logger;

  constructor(
    private readonly embedder: EmbeddingClient,
    private readonly retriever: Retriever,
    private readonly generator: AnswerGenerator,
    private readonly options: ChatServiceOptions
  ) {
    this.logger = options.logger ?? new NullLogger();
  }

  async reply(message: string): Promise<ChatReply> {
    const question = message.trim();
    const intent = classifyMessage(question);

    if (intent === "conversational") {
      const greeting = await this.generator.greet(question);
      return { ...greeting, intent, retrieved: [] };
    }

    const vector = await this.embedder.embed(question);
    const matches = await this.retriever.retrieve(vector, this.options.topK);
    const relevant = matches.filter((m) => m.score > this.options.minScore);
    if (relevant.length < matches.length) {
      this.logger.debug("Dropped low-scoring matches", {
        dropped: matches.length - relevant.length,
        minScore: this.options.minScore,
      });
    }

    const generated = await this.generator.answer(question, relevant);
    return { ...generated, intent, retrieved: relevant };
  }
}
