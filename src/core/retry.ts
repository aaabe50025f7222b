/**
 * Retry policies as plain values, and the loop that applies them.
 */
import { setTimeout as sleep } from "node:timers/promises";

export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxAttempts: number;
  /** Fixed wait between attempts. */
  backoffMs: number;
}

export const EMBEDDING_RETRY: RetryPolicy = { maxAttempts: 3, backoffMs: 2000 };
export const KEYWORD_RETRY: RetryPolicy = { maxAttempts: 60, backoffMs: 1000 };

export interface RetryOptions {
  /** Return false to stop retrying on this error. Defaults to always retry. */
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
}

/**
 * Call `operation` until it resolves or the policy is exhausted.
 * The last error is rethrown.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const attempts = Math.max(1, Math.floor(policy.maxAttempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === attempts) break;
      if (opts.isRetryable && !opts.isRetryable(err)) break;
      opts.onRetry?.(attempt, err);
      if (policy.backoffMs > 0) await sleep(policy.backoffMs);
    }
  }

  throw lastError;
}
