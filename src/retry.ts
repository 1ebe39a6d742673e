import { setTimeout as delay } from "node:timers/promises";
import { isRetryable, RateLimitedError } from "./errors.js";

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
  retryable?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, waitMs: number) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await delay(ms, undefined, { signal });
};

export function backoffDelay(err: unknown, attempt: number, baseDelayMs: number, maxDelayMs: number, now = Date.now()): number {
  if (err instanceof RateLimitedError && err.resetAt) {
    return Math.max(0, err.resetAt.getTime() - now) + 1000;
  }
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Runs `fn` until it succeeds, a non-retryable error is thrown, or
 * `maxAttempts` is used up; the last error is rethrown. Rate-limit errors
 * wait for their reset time. Aborting the signal stops between attempts.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs = 1000, maxDelayMs = 60_000, signal } = opts;
  const retryable = opts.retryable ?? isRetryable;
  const sleep = opts.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !retryable(err)) throw err;
      const waitMs = backoffDelay(err, attempt, baseDelayMs, maxDelayMs);
      opts.onRetry?.(err, attempt, waitMs);
      await sleep(waitMs, signal);
    }
  }
}
