import { describeError } from "../errors.js";
import type { LLMClient } from "../llm/client.js";
import type { Logger } from "../lib/logger.js";
import { NullLogger } from "../lib/logger.js";
import type { ScoredChunk } from "../retrieval/types.js";
import { buildContext, collectSources } from "./context.js";
import {
  FALLBACK_ANSWER,
  NO_CONTEXT_ANSWER,
  answerLacksCoverage,
  answerSystemPrompt,
  buildAnswerPrompt,
  cannedGreeting,
  formatSourceLinks,
  greetingSystemPrompt,
  type SourceLink,
} from "./prompts.js";

export type AnswerKind = "greeting" | "grounded" | "no-context" | "fallback";

export interface GeneratedAnswer {
  answer: string;
  kind: AnswerKind;
  sources: SourceLink[];
}

export interface AnswerGeneratorOptions {
  assistantName: string;
  maxAnswerTokens: number;
  maxGreetingTokens: number;
  logger?: Logger;
}

/**
 * Turns a question (and, for substantive questions, retrieved chunks) into a reply.
 * Never rejects: LLM failures become a fixed fallback message.
 */
export class AnswerGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly llm: LLMClient,
    private readonly options: AnswerGeneratorOptions
  ) {
    this.logger = options.logger ?? new NullLogger();
  }

  async greet(message: string): Promise<GeneratedAnswer> {
    const { assistantName, maxGreetingTokens } = this.options;
    try {
      const answer = await this.llm.complete(
        [
          { role: "system", content: greetingSystemPrompt(assistantName) },
          { role: "user", content: message },
        ],
        { maxTokens: maxGreetingTokens, temperature: 0.8 }
      );
      return { answer, kind: "greeting", sources: [] };
    } catch (err) {
      this.logger.warn("Greeting completion failed, using canned reply", { error: describeError(err) });
      return { answer: cannedGreeting(assistantName), kind: "greeting", sources: [] };
    }
  }

  /**
   * Answer from the given chunks. With no chunks the question is declined rather than answered
   * from general knowledge.
   */
  async answer(question: string, chunks: ScoredChunk[]): Promise<GeneratedAnswer> {
    if (chunks.length === 0) {
      return { answer: NO_CONTEXT_ANSWER, kind: "no-context", sources: [] };
    }

    const context = buildContext(chunks);
    this.logger.debug("Context built", { chars: context.length, chunks: chunks.length });

    let text: string;
    try {
      text = await this.llm.complete(
        [
          { role: "system", content: answerSystemPrompt(this.options.assistantName) },
          { role: "user", content: buildAnswerPrompt(context, question) },
        ],
        { maxTokens: this.options.maxAnswerTokens, temperature: 0.7, topP: 0.9 }
      );
    } catch (err) {
      this.logger.error("Answer generation failed", { error: describeError(err) });
      return { answer: FALLBACK_ANSWER, kind: "fallback", sources: [] };
    }

    if (answerLacksCoverage(text)) {
      return { answer: text, kind: "grounded", sources: [] };
    }
    const sources = collectSources(chunks);
    const answer = sources.length > 0 ? `${text}\n\n${formatSourceLinks(sources)}` : text;
    return { answer, kind: "grounded", sources };
  }
}
