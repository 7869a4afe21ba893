/** Transcript file extensions the ingestion pipeline can read (plain text + extractable office). */
export const TEXT_EXT = [".md", ".markdown", ".txt"];
export const OFFICE_EXT = [".pdf", ".docx", ".pptx", ".odt"];
export const ALLOWED_EXT = [...TEXT_EXT, ...OFFICE_EXT];

export function isAllowedExt(ext: string): boolean {
  return ALLOWED_EXT.includes(ext.toLowerCase());
}

export function isOfficeExt(ext: string): boolean {
  return OFFICE_EXT.includes(ext.toLowerCase());
}
