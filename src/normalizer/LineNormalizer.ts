/**
 * LineNormalizer: per-line keep/drop/reshape decision.
 *
 * Every line maps to exactly one outcome:
 *   - blank:   empty after trimming; a paragraph boundary for the assembler
 *   - dropped: repeated boilerplate or a short fragment with no structure
 *   - kept:    trimmed content plus a normalized indent level (0–2)
 */

import { NORMALIZER_DEFAULTS } from "../config/constants";
import { LINE_EXCEPTION_PATTERN, countWords } from "./structuralPatterns";

export type IndentLevel = 0 | 1 | 2;

export interface BlankLine {
  kind: "blank";
}

export interface DroppedLine {
  kind: "dropped";
  reason: "repeated" | "short";
}

export interface KeptLine {
  kind: "kept";
  content: string;
  indentLevel: IndentLevel;
}

export type LineOutcome = BlankLine | DroppedLine | KeptLine;

/** Outcomes the paragraph assembler consumes (dropped lines never reach it) */
export type AssemblableLine = BlankLine | KeptLine;

const BLANK: BlankLine = { kind: "blank" };

export function isStructuralLine(trimmed: string): boolean {
  return LINE_EXCEPTION_PATTERN.test(trimmed);
}

/** Leading whitespace count of the untrimmed line */
export function leadingWhitespace(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Source PDFs indent with irregular runs of spaces; collapse them to at
 * most two levels. Anything deeper than MAX_INDENT_SPACES is column layout.
 */
export function indentLevelFor(leading: number): IndentLevel {
  if (leading <= 0 || leading > NORMALIZER_DEFAULTS.MAX_INDENT_SPACES) return 0;
  const level = Math.floor(leading / NORMALIZER_DEFAULTS.SPACES_PER_INDENT_LEVEL);
  if (level >= NORMALIZER_DEFAULTS.MAX_INDENT_LEVEL) return 2;
  return level === 1 ? 1 : 0;
}

export function normalizeLine(
  line: string,
  repeated: ReadonlySet<string>,
  minWordThreshold: number = NORMALIZER_DEFAULTS.MIN_WORD_THRESHOLD
): LineOutcome {
  const trimmed = line.trim();
  if (!trimmed) return BLANK;

  if (repeated.has(trimmed)) {
    return { kind: "dropped", reason: "repeated" };
  }

  if (countWords(trimmed) < minWordThreshold && !isStructuralLine(trimmed)) {
    return { kind: "dropped", reason: "short" };
  }

  return {
    kind: "kept",
    content: trimmed,
    indentLevel: indentLevelFor(leadingWhitespace(line)),
  };
}

export function isAssemblable(outcome: LineOutcome): outcome is AssemblableLine {
  return outcome.kind !== "dropped";
}

/**
 * String form of an outcome: "" for a blank, the indent-prefixed content
 * for a kept line, null for a dropped one.
 */
export function renderLine(outcome: LineOutcome): string | null {
  switch (outcome.kind) {
    case "blank":
      return "";
    case "dropped":
      return null;
    case "kept":
      return NORMALIZER_DEFAULTS.INDENT_UNIT.repeat(outcome.indentLevel) + outcome.content;
  }
}
