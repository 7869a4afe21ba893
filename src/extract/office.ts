/**
 * Extract plain text from PDF, Word, PowerPoint and OpenDocument transcripts.
 */
import { parseOfficeAsync } from "officeparser";

/**
 * Returns plain text from the document buffer, or null if extraction fails or finds nothing.
 */
export async function extractText(buffer: Buffer): Promise<string | null> {
  try {
    const text = await parseOfficeAsync(buffer);
    return (text && text.trim()) || null;
  } catch {
    return null;
  }
}
