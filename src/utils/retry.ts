import { isLexNormError } from "../errors";
import { logger, type LogSink } from "./logger";

/**
 * Backoff for re-fetching a PDF. The delay doubles after each failed
 * attempt and is capped at `maxDelayMs`.
 */
export interface RetryPolicy {
  attempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

/** A few attempts, spaced out enough for a busy court portal. */
export const DOWNLOAD_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10_000,
};

/**
 * Only failures the network layer flagged as transient are retried:
 * timeouts, dropped connections and 5xx responses. Anything else (a 404,
 * an oversized body, a bug) fails on the first attempt.
 */
export function isTransientFailure(error: unknown): boolean {
  return isLexNormError(error) && error.isRetryable;
}

export function backoffDelay(policy: RetryPolicy, failedAttempt: number): number {
  return Math.min(policy.initialDelayMs * 2 ** (failedAttempt - 1), policy.maxDelayMs);
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: Partial<RetryPolicy> = {},
  label = "operation",
  log: LogSink = logger
): Promise<T> {
  const resolved: RetryPolicy = { ...DOWNLOAD_RETRY_POLICY, ...policy };

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isTransientFailure(error) || attempt >= resolved.attempts) throw error;

      const delay = backoffDelay(resolved, attempt);
      log.warn(`${label} failed, retrying in ${delay}ms`, { attempt, attempts: resolved.attempts }, error);
      await sleep(delay);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
