import OpenAI from "openai";
import type { Settings } from "../config/settings.js";
import { EmbeddingError, GenerationError } from "../errors.js";
import type { CompletionOptions, LLMClient, LLMMessage } from "./client.js";
import { MAX_EMBED_INPUT, type EmbeddingClient } from "./embedding.js";

type ChatSettings = Pick<Settings, "llmApiKey" | "llmBaseUrl" | "chatModel" | "requestTimeoutMs">;
type EmbeddingSettings = Pick<
  Settings,
  "openaiApiKey" | "embeddingModel" | "embeddingDimension" | "requestTimeoutMs"
>;

/**
 * Chat completions against OpenAI, or any OpenAI-compatible endpoint when llmBaseUrl is set.
 */
export function createOpenAIClient(settings: ChatSettings): LLMClient {
  const openai = new OpenAI({
    apiKey: settings.llmApiKey,
    baseURL: settings.llmBaseUrl ?? undefined,
    timeout: settings.requestTimeoutMs,
    maxRetries: 1,
  });

  return {
    async complete(messages: LLMMessage[], options?: CompletionOptions): Promise<string> {
      let content: string | null | undefined;
      try {
        const response = await openai.chat.completions.create({
          model: settings.chatModel,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          max_tokens: options?.maxTokens ?? 400,
          temperature: options?.temperature,
          top_p: options?.topP,
        });
        content = response.choices[0]?.message?.content;
      } catch (err) {
        throw new GenerationError(`Chat completion with ${settings.chatModel} failed`, { cause: err });
      }
      const text = content?.trim();
      if (!text) throw new GenerationError("Empty LLM response");
      return text;
    },
  };
}

export function createOpenAIEmbeddingClient(settings: EmbeddingSettings): EmbeddingClient {
  const openai = new OpenAI({
    apiKey: settings.openaiApiKey,
    timeout: settings.requestTimeoutMs,
    maxRetries: 1,
  });
  const dimension = settings.embeddingDimension;

  return {
    dimension,
    async embed(text: string): Promise<number[]> {
      const input = text.trim().slice(0, MAX_EMBED_INPUT);
      if (!input) throw new EmbeddingError("Cannot embed empty text");

      let vec: number[] | undefined;
      try {
        const response = await openai.embeddings.create({
          model: settings.embeddingModel,
          input,
          dimensions: dimension,
        });
        vec = response.data[0]?.embedding;
      } catch (err) {
        throw new EmbeddingError(`Embedding with ${settings.embeddingModel} failed`, { cause: err });
      }
      if (!vec || !Array.isArray(vec)) throw new EmbeddingError("Empty embedding response");
      if (vec.length !== dimension) {
        throw new EmbeddingError(`Embedding has ${vec.length} components, expected ${dimension}`);
      }
      return vec;
    },
  };
}
