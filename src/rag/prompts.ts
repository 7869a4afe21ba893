/**
 * Prompt templates and fixed replies for the sermon assistant.
 */

export const EXAMPLE_TOPICS = ["faith", "grace", "prayer", "love", "hope"];

export function greetingSystemPrompt(assistantName: string): string {
  return `You are ${assistantName}, a friendly assistant that helps people explore Biblical sermons and teachings. When greeted, respond warmly in one or two sentences and invite them to ask questions about faith, sermons, or Biblical topics.`;
}

export function answerSystemPrompt(assistantName: string): string {
  return `You are ${assistantName}, a knowledgeable and warm assistant helping people understand Biblical sermons.
Rules:
- Answer only from the sermon excerpts you are given. Do not add facts, names, dates or quotations that are not in them.
- If the excerpts do not address the question, say that the sermons don't cover it.
- Be conversational and clear. Keep the answer to a few short paragraphs.`;
}

export function buildAnswerPrompt(context: string, question: string): string {
  return `Use the following sermon excerpts to answer the question. Be conversational, clear, and faithful to the content.

SERMON EXCERPTS:
${context}

QUESTION:
${question}

ANSWER (be warm and helpful):`;
}

export function cannedGreeting(assistantName: string): string {
  return `Hello! I'm ${assistantName}, here to help you explore our sermons. Ask me about ${EXAMPLE_TOPICS.join(", ")}, or any Biblical topic!`;
}

export const NO_CONTEXT_ANSWER = `I couldn't find any relevant sermon content to answer that question. I can help with topics like ${EXAMPLE_TOPICS.join(", ")} and other Biblical teachings. Could you rephrase your question or try a different topic?`;

export const FALLBACK_ANSWER =
  "I'm having trouble answering right now. Please try again in a moment.";

/** Phrases in a generated answer that mean the excerpts did not cover the question. */
export const NO_COVERAGE_MARKERS = [
  "don't cover",
  "do not cover",
  "don't have specific sermons",
  "don't have sermons",
  "no sermons about",
];

export function answerLacksCoverage(answer: string): boolean {
  const lower = answer.toLowerCase().replace(/[\u2018\u2019]/g, "'");
  return NO_COVERAGE_MARKERS.some((m) => lower.includes(m));
}

export interface SourceLink {
  title: string;
  url: string;
  category: string;
}

export function formatSourceLinks(sources: SourceLink[]): string {
  const lines = sources.map((s) => `• [${s.title}](${s.url})`);
  return `📖 **Learn more from these sermons:**\n${lines.join("\n")}`;
}
