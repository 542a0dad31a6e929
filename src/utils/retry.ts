/**
 * Retry Logic with Exponential Backoff
 *
 * Used for short-lived outbound requests (notification delivery). The poll
 * loop has its own backoff policy and does not go through this helper.
 */

import { logger } from './logger.js';
import { sleep } from './timeouts.js';

const log = logger.retry;

export interface RetryOptions {
  /**
   * Maximum number of total attempts (not retries).
   * - maxAttempts: 1 = no retries
   * - maxAttempts: 3 = 1 initial attempt + up to 2 retries
   *
   * @default 3
   */
  maxAttempts?: number;

  /**
   * Initial delay before first retry in milliseconds.
   * @default 1000
   */
  initialDelayMs?: number;

  /**
   * Maximum delay between retries in milliseconds.
   * @default 10000
   */
  maxDelayMs?: number;

  /**
   * delay = min(initialDelayMs * backoffMultiplier^retryCount, maxDelayMs)
   * @default 2
   */
  backoffMultiplier?: number;

  /**
   * Return true to retry, false to throw immediately.
   * @default Retries on network errors, timeouts, 429 and 5xx responses
   */
  retryOn?: (error: Error) => boolean;

  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Error raised for a non-2xx HTTP response so retryOn can inspect the status.
 */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    statusText: string
  ) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpStatusError';
  }
}

export async function ensureOk(response: Response): Promise<void> {
  if (!response.ok) {
    throw new HttpStatusError(response.status, response.statusText);
  }
}

export function isTransientError(error: Error): boolean {
  if (error instanceof HttpStatusError) {
    return error.status === 429 || error.status >= 500;
  }
  const message = error.message.toLowerCase();
  return (
    error.name === 'TimeoutError' ||
    message.includes('timeout') ||
    message.includes('network') ||
    message.includes('fetch failed') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('socket hang up')
  );
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  retryOn: isTransientError,
  onRetry: () => {},
};

/**
 * Execute an async function with automatic retry on failure.
 *
 * @throws Last error if all attempts fail
 *
 * @example
 * ```typescript
 * await withRetry(() => postMessage(chatId, text), { maxAttempts: 2 });
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error = new Error('withRetry made no attempts');
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === opts.maxAttempts || !opts.retryOn(lastError)) {
        throw lastError;
      }

      opts.onRetry(attempt, lastError, delay);

      log.warn('Retry attempt failed', {
        attempt,
        maxAttempts: opts.maxAttempts,
        error: lastError.message,
        retryDelayMs: delay,
      });

      await sleep(delay);

      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }

  throw lastError;
}
