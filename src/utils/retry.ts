/**
 * RETRY WITH EXPONENTIAL BACKOFF
 * ==============================
 * Used inside a single exchange request. Failures that survive the retries
 * fall through to the poller, which waits for the next tick.
 */

import { isTransientError } from "./errors";

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 2) */
  maxRetries?: number;
  /** Initial delay in ms before first retry (default: 500) */
  initialDelayMs?: number;
  /** Maximum delay cap in ms (default: 8000) */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Only retry if this predicate returns true for the error */
  retryIf?: (error: unknown) => boolean;
  /** Called before each wait */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Wait implementation (tests pass a no-op) */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Execute an async function with retry and exponential backoff.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 2,
    initialDelayMs = 500,
    maxDelayMs = 8000,
    backoffMultiplier = 2,
    retryIf = isTransientError,
    onRetry,
    sleep = defaultSleep,
  } = options;

  let lastError: unknown;
  let delay = initialDelayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= maxRetries || !retryIf(error)) {
        throw error;
      }

      onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }

  throw lastError;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
