/**
 * Bounded retry with exponential backoff, cut short by an abort signal
 */

import { setTimeout as sleep } from "timers/promises";
import { isFanoutError } from "@fanout/core";

export interface RetryPolicy {
  /** Attempts including the first one */
  maxAttempts: number;
  backoffMs: number;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; aborted: false; error: unknown; attempts: number }
  | { ok: false; aborted: true; attempts: number };

export interface RetryHooks {
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void | Promise<void>;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.backoffMs * Math.pow(2, attempt - 1);
}

/**
 * Call fn until it resolves, the attempts run out, or the signal fires.
 * Fanout errors flagged non-retryable end the loop on the first failure.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<RetryOutcome<T>> {
  const { signal, onRetry } = hooks;
  let attempt = 0;

  while (true) {
    if (signal?.aborted) {
      return { ok: false, aborted: true, attempts: attempt };
    }

    attempt++;
    try {
      return { ok: true, value: await fn(attempt), attempts: attempt };
    } catch (error) {
      if (signal?.aborted) {
        return { ok: false, aborted: true, attempts: attempt };
      }

      const retryable = !isFanoutError(error) || error.retryable;
      if (!retryable || attempt >= policy.maxAttempts) {
        return { ok: false, aborted: false, error, attempts: attempt };
      }

      const delay = backoffDelay(policy, attempt);
      await onRetry?.(attempt, error, delay);

      try {
        await sleep(delay, undefined, { signal });
      } catch (sleepError) {
        if (signal?.aborted) {
          return { ok: false, aborted: true, attempts: attempt };
        }
        throw sleepError;
      }
    }
  }
}
