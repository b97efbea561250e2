import { LexNormValidationError } from "../errors";
import { NORMALIZER_DEFAULTS } from "./constants";

export interface NormalizerOptions {
  minWordThreshold: number;
  documentRepeatThreshold: number;
}

export const DEFAULT_NORMALIZER_OPTIONS: NormalizerOptions = {
  minWordThreshold: NORMALIZER_DEFAULTS.MIN_WORD_THRESHOLD,
  documentRepeatThreshold: NORMALIZER_DEFAULTS.DOCUMENT_REPEAT_THRESHOLD,
};

export function assertPositiveInteger(field: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw LexNormValidationError.invalidOption(field, "a positive integer", value, {
      operation: "resolveNormalizerOptions",
    });
  }
  return value;
}

/**
 * Merge overrides onto the defaults, rejecting anything that is not a
 * positive integer.
 */
export function resolveNormalizerOptions(
  overrides: Partial<NormalizerOptions> = {}
): NormalizerOptions {
  const merged = { ...DEFAULT_NORMALIZER_OPTIONS, ...overrides };
  return {
    minWordThreshold: assertPositiveInteger("minWordThreshold", merged.minWordThreshold),
    documentRepeatThreshold: assertPositiveInteger("documentRepeatThreshold", merged.documentRepeatThreshold),
  };
}

/**
 * Read overrides from LEXNORM_MIN_WORDS and LEXNORM_REPEAT_THRESHOLD.
 * Unset or blank variables fall back to the defaults.
 */
export function normalizerOptionsFromEnv(
  env: Record<string, string | undefined> = process.env
): NormalizerOptions {
  const overrides: Partial<NormalizerOptions> = {};
  const minWords = env.LEXNORM_MIN_WORDS?.trim();
  if (minWords) overrides.minWordThreshold = Number(minWords);
  const repeat = env.LEXNORM_REPEAT_THRESHOLD?.trim();
  if (repeat) overrides.documentRepeatThreshold = Number(repeat);
  return resolveNormalizerOptions(overrides);
}
