/**
 * Centralized constants for lexnorm
 * Avoids magic numbers scattered throughout codebase
 */

export const NORMALIZER_DEFAULTS = {
  /** Lines and paragraphs with fewer words are noise unless structural */
  MIN_WORD_THRESHOLD: 3,
  /** Repeat count that marks a line as boilerplate within a single page */
  PAGE_REPEAT_THRESHOLD: 3,
  /** Repeat count across a whole document; lower so per-page headers go */
  DOCUMENT_REPEAT_THRESHOLD: 2,
  /** Trimmed lines this short or shorter are never counted as repeats */
  MIN_REPEATED_LENGTH: 10,
  /** Leading whitespace beyond this is treated as layout noise, not indent */
  MAX_INDENT_SPACES: 10,
  SPACES_PER_INDENT_LEVEL: 4,
  MAX_INDENT_LEVEL: 2,
  INDENT_UNIT: "  ",
} as const;

export const HTTP_DEFAULTS = {
  TIMEOUT_MS: 30_000,
  MAX_CONTENT_BYTES: 200_000_000,
  USER_AGENT: "lexnorm/1.x",
} as const;

export const OUTPUT_DEFAULTS = {
  SUFFIX: "_extracted",
  EXTENSION: ".md",
  URL_BASENAME: "extracted_text_from_url",
  PAGE_HEADING: "## Page",
} as const;
