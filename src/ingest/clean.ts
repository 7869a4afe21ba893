export function removeNonAscii(text: string): string {
  return text.replace(/[^\x00-\x7F]+/g, "");
}

/**
 * Normalize transcript text before chunking: drop non-ASCII characters and bracketed footnotes,
 * strip a leading "Summary:" / "Summarized:" label, and collapse whitespace.
 */
export function cleanContent(text: string): string {
  if (!text) return "";
  return removeNonAscii(text)
    .replace(/\[[^\]]*?\]/g, " ")
    .replace(/^\s*(summary|summarized)\s*:?\s*/i, "")
    .replace(/\s+/g, " ")
    .trim();
}
