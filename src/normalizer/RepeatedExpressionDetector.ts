import { NORMALIZER_DEFAULTS } from "../config/constants";
import { assertPositiveInteger } from "../config/NormalizerOptions";

/**
 * Find lines that recur often enough to be running headers or footers.
 *
 * Only trimmed lines longer than `minLength` are counted, so short
 * structural tokens ("1.", "Art. 5") are never treated as boilerplate.
 */
export function detectRepeatedExpressions(
  lines: readonly string[],
  threshold: number = NORMALIZER_DEFAULTS.PAGE_REPEAT_THRESHOLD,
  minLength: number = NORMALIZER_DEFAULTS.MIN_REPEATED_LENGTH
): ReadonlySet<string> {
  assertPositiveInteger("threshold", threshold);

  const counts = new Map<string, number>();
  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed.length > minLength) {
      counts.set(trimmed, (counts.get(trimmed) ?? 0) + 1);
    }
  }

  const repeated = new Set<string>();
  for (const [line, count] of counts) {
    if (count >= threshold) repeated.add(line);
  }
  return repeated;
}
