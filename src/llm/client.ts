/**
 * Generic LLM completion interface so the chat provider can be swapped.
 */
export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  topP?: number;
}

export interface LLMClient {
  /** Resolves to the trimmed completion text. Rejects with GenerationError. */
  complete(messages: LLMMessage[], options?: CompletionOptions): Promise<string>;
}
