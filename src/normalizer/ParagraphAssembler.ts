/**
 * ParagraphAssembler: folds normalized lines into paragraphs.
 *
 * Blank lines close the current paragraph. An indented line closes it too
 * and opens a new one, since indentation marks a new item or clause.
 * Anything else continues the current paragraph.
 */

import { NORMALIZER_DEFAULTS } from "../config/constants";
import type { AssemblableLine } from "./LineNormalizer";
import { PARAGRAPH_EXCEPTION_PATTERN, countWords } from "./structuralPatterns";

export function assembleParagraphs(
  lines: readonly AssemblableLine[],
  minWords: number = NORMALIZER_DEFAULTS.MIN_WORD_THRESHOLD
): string[] {
  const paragraphs: string[] = [];
  let current: string[] = [];

  const flush = () => {
    if (current.length > 0) {
      paragraphs.push(current.join(" "));
      current = [];
    }
  };

  for (const line of lines) {
    if (line.kind === "blank") {
      flush();
    } else if (line.indentLevel > 0) {
      flush();
      current.push(line.content);
    } else {
      current.push(line.content);
    }
  }
  flush();

  return filterNoiseParagraphs(paragraphs, minWords);
}

/**
 * Second short-text pass at paragraph granularity. Joined fragments can
 * still come out below the threshold.
 */
export function filterNoiseParagraphs(
  paragraphs: readonly string[],
  minWords: number = NORMALIZER_DEFAULTS.MIN_WORD_THRESHOLD
): string[] {
  return paragraphs.filter(
    (p) => countWords(p) >= minWords || PARAGRAPH_EXCEPTION_PATTERN.test(p)
  );
}
