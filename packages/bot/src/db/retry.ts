/**
 * Retry for units of work
 *
 * Transient storage failures (lock conflicts, a lost connection, a briefly
 * exhausted pool) are retried with exponential backoff and jitter. Each
 * attempt is a fresh unit of work; nothing from a failed attempt survives.
 */

import { setTimeout as sleep } from "timers/promises";
import { OperationCancelledError, isRetriable } from "../lib/errors";

export interface RetryOptions {
  /** Total attempts including the first one. */
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Source of jitter in [0, 1). */
  random?: () => number;
}

export const DEFAULT_RETRY_OPTIONS = {
  attempts: 3,
  baseDelayMs: 50,
  maxDelayMs: 1_000,
} as const;

export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  // Full jitter over the upper half keeps retries of the same event apart
  return Math.round(exponential / 2 + (random() * exponential) / 2);
}

export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = options.attempts ?? DEFAULT_RETRY_OPTIONS.attempts;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  const shouldRetry = options.shouldRetry ?? isRetriable;
  const { signal } = options;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new OperationCancelledError("Retry cancelled", { cause: signal.reason });
    }

    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error, attempt)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs, options.random);
      options.onRetry?.(error, attempt, delayMs);

      try {
        await sleep(delayMs, undefined, { signal });
      } catch (sleepError) {
        throw new OperationCancelledError("Retry cancelled", { cause: sleepError });
      }
    }
  }
}
