import { describe, it, expect, vi } from 'vitest';
import { HttpStatusError, isTransientError, withRetry, type RetryOptions } from '../../src/utils/retry.js';

describe('withRetry', () => {
  describe('successful execution', () => {
    it('should return result on first successful attempt', async () => {
      const result = await withRetry(async () => 'success');
      expect(result).toBe('success');
    });
  });

  describe('retry behavior', () => {
    it('should retry on retryable errors', async () => {
      let attempts = 0;
      const result = await withRetry(
        async () => {
          attempts++;
          if (attempts < 3) {
            throw new Error('timeout occurred');
          }
          return 'success';
        },
        { initialDelayMs: 1, maxDelayMs: 10 }
      );

      expect(result).toBe('success');
      expect(attempts).toBe(3);
    });

    it('should throw after max attempts exceeded', async () => {
      let attempts = 0;
      await expect(
        withRetry(
          async () => {
            attempts++;
            throw new Error('timeout occurred');
          },
          { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 10 }
        )
      ).rejects.toThrow('timeout occurred');

      expect(attempts).toBe(3);
    });

    it('should not retry on non-retryable errors', async () => {
      let attempts = 0;
      await expect(
        withRetry(
          async () => {
            attempts++;
            throw new HttpStatusError(401, 'Unauthorized');
          },
          { maxAttempts: 3, initialDelayMs: 1 }
        )
      ).rejects.toThrow('HTTP 401: Unauthorized');

      expect(attempts).toBe(1);
    });
  });

  describe('custom retryOn function', () => {
    it('should not retry when custom retryOn returns false', async () => {
      let attempts = 0;
      const options: RetryOptions = {
        maxAttempts: 3,
        initialDelayMs: 1,
        retryOn: () => false,
      };

      await expect(
        withRetry(async () => {
          attempts++;
          throw new Error('timeout');
        }, options)
      ).rejects.toThrow('timeout');

      expect(attempts).toBe(1);
    });
  });

  describe('exponential backoff', () => {
    it('should double the delay and cap it at maxDelayMs', async () => {
      const onRetry = vi.fn();

      await expect(
        withRetry(
          async () => {
            throw new Error('timeout');
          },
          { maxAttempts: 4, initialDelayMs: 2, maxDelayMs: 5, backoffMultiplier: 2, onRetry }
        )
      ).rejects.toThrow('timeout');

      expect(onRetry.mock.calls.map(([attempt, , delay]) => [attempt, delay])).toEqual([
        [1, 2],
        [2, 4],
        [3, 5],
      ]);
    });
  });

  describe('error handling', () => {
    it('should convert non-Error throws to Error objects', async () => {
      await expect(
        withRetry(
          async () => {
            throw 'string error';
          },
          { maxAttempts: 1 }
        )
      ).rejects.toThrow('string error');
    });
  });
});

describe('isTransientError', () => {
  it('should treat rate limits and server errors as transient', () => {
    expect(isTransientError(new HttpStatusError(429, 'Too Many Requests'))).toBe(true);
    expect(isTransientError(new HttpStatusError(502, 'Bad Gateway'))).toBe(true);
    expect(isTransientError(new HttpStatusError(404, 'Not Found'))).toBe(false);
  });

  it('should recognise network failures', () => {
    expect(isTransientError(new TypeError('fetch failed'))).toBe(true);
    expect(isTransientError(new Error('read ECONNRESET'))).toBe(true);
    expect(isTransientError(new Error('invalid chat id'))).toBe(false);
  });

  it('should recognise aborted requests that timed out', () => {
    const error = new Error('The operation was aborted due to timeout');
    error.name = 'TimeoutError';

    expect(isTransientError(error)).toBe(true);
  });
});
