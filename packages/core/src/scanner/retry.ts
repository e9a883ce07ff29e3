/**
 * Retry with exponential backoff
 *
 * delay(n) = min(baseDelayMs × 2^n, maxDelayMs) for retry n = 0, 1, ...
 * Only errors accepted by `shouldRetry` are retried; the default accepts
 * transient fetch failures.
 */

import { CancelledError, isTransient } from '../errors/index.js';

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  /** @default 30000 */
  maxDelayMs?: number;
  signal?: AbortSignal | undefined;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const DEFAULT_MAX_DELAY_MS = 30_000;

export function computeRetryDelayMs(retry: number, baseDelayMs: number, maxDelayMs = DEFAULT_MAX_DELAY_MS): number {
  return Math.min(baseDelayMs * 2 ** retry, maxDelayMs);
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isTransient;
  let attempt = 0;

  for (;;) {
    throwIfAborted(options.signal);
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= options.maxRetries || !shouldRetry(error) || options.signal?.aborted) {
        throw error;
      }
      const delayMs = computeRetryDelayMs(attempt, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs, options.signal);
      attempt++;
    }
  }
}

/**
 * Resolve after `ms`, or reject with CancelledError when `signal` aborts first
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
