export type MessageIntent = "conversational" | "substantive";

/** Whole-message greetings and pleasantries, compared after normalization. */
export const GREETING_PHRASES: readonly string[] = [
  "hi",
  "hello",
  "hey",
  "yo",
  "sup",
  "howdy",
  "greetings",
  "good morning",
  "good afternoon",
  "good evening",
  "hi there",
  "hello there",
  "hey there",
  "thanks",
  "thank you",
];

/** Messages shorter than this many words without a question mark count as small talk. */
export const MIN_QUESTION_WORDS = 3;

export function normalizeMessage(text: string): string {
  return text
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim()
    .replace(/[!.,\s]+$/, "");
}

/**
 * Decide whether a message needs retrieval.
 *
 * Conversational when the normalized message is a known greeting phrase, or when it has fewer
 * than MIN_QUESTION_WORDS words and no "?". Everything else is substantive.
 */
export function classifyMessage(text: string): MessageIntent {
  const normalized = normalizeMessage(text);
  if (GREETING_PHRASES.includes(normalized)) return "conversational";
  const words = normalized.split(" ").filter((w) => w.length > 0);
  if (words.length < MIN_QUESTION_WORDS && !normalized.includes("?")) return "conversational";
  return "substantive";
}
