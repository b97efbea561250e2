/**
 * Short text that still carries legal structure and must survive the
 * word-count filters.
 */

/** Line level: list marker, D/M/YYYY date, or article reference */
export const LINE_EXCEPTION_PATTERN = /^\d+[.)]\s*|^\d{1,2}\/\d{1,2}\/\d{4}|^Art\.?\s*\d+/;

/** Paragraph level: list marker or "Art." reference */
export const PARAGRAPH_EXCEPTION_PATTERN = /^\d+[.)]|^Art\./;

/** Count words in a string (split on whitespace, filter empties) */
export function countWords(text: string): number {
  const trimmed = text.trim();
  if (!trimmed) return 0;
  return trimmed.split(/\s+/).length;
}
