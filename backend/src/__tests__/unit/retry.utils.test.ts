/**
 * Unit Tests: Retry Utils
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  calculateBackoffDelay,
  callExternal,
  isTransientError,
  retryTransient,
  withRetry,
  withTimeout,
  DEFAULT_RETRY_CONFIG,
  TimeoutError,
  type RetryConfig,
} from '../../application/resilience/retry.utils.js';
import { AppError } from '../../application/errors/app-error.js';

function networkError(code: string, message = `connect ${code}`): Error {
  return Object.assign(new Error(message), { code });
}

const FAST: RetryConfig = { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 10, jitterFactor: 0 };

describe('Retry Utils', () => {
  beforeEach(() => {
    vi.useRealTimers();
  });

  describe('calculateBackoffDelay', () => {
    it('should calculate exponential backoff', () => {
      const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, baseDelayMs: 100, jitterFactor: 0 };

      expect(calculateBackoffDelay(0, config)).toBe(100);
      expect(calculateBackoffDelay(1, config)).toBe(200);
      expect(calculateBackoffDelay(2, config)).toBe(400);
    });

    it('should keep jitter within the configured factor', () => {
      const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, baseDelayMs: 100, jitterFactor: 0.3 };

      for (let i = 0; i < 20; i++) {
        const delay = calculateBackoffDelay(1, config);
        expect(delay).toBeGreaterThanOrEqual(140);
        expect(delay).toBeLessThanOrEqual(260);
      }
    });

    it('should respect maxDelayMs cap', () => {
      const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, maxDelayMs: 500, jitterFactor: 0 };

      expect(calculateBackoffDelay(10, config)).toBe(500);
    });
  });

  describe('isTransientError', () => {
    it('should treat network error codes as transient', () => {
      expect(isTransientError(networkError('ECONNRESET'))).toBe(true);
      expect(isTransientError(networkError('ECONNREFUSED'))).toBe(true);
      expect(isTransientError(networkError('EAI_AGAIN'))).toBe(true);
    });

    it('should treat timeouts as transient', () => {
      expect(isTransientError(new TimeoutError('redis', 50))).toBe(true);
      expect(isTransientError(new Error('Command timed out'))).toBe(true);
    });

    it('should recognise dropped PostgreSQL connections', () => {
      expect(isTransientError(networkError('57P01', 'terminating connection due to administrator command'))).toBe(true);
      expect(isTransientError(new Error('Connection terminated unexpectedly'))).toBe(true);
    });

    it('should look through a wrapping error to its cause', () => {
      const wrapped = new Error('Failed query: select 1', { cause: networkError('ECONNRESET') });

      expect(isTransientError(wrapped)).toBe(true);
    });

    it('should not retry application errors', () => {
      expect(isTransientError(new Error('duplicate key value'))).toBe(false);
      expect(isTransientError('ECONNRESET')).toBe(false);
      expect(isTransientError(null)).toBe(false);
    });
  });

  describe('withTimeout', () => {
    it('should resolve when the operation settles in time', async () => {
      await expect(withTimeout(Promise.resolve('ok'), 50, 'fast')).resolves.toBe('ok');
    });

    it('should reject with TimeoutError when the operation hangs', async () => {
      const hanging = new Promise<string>(() => undefined);

      await expect(withTimeout(hanging, 10, 'slow op')).rejects.toThrow('slow op timed out after 10ms');
    });
  });

  describe('withRetry', () => {
    it('should return result on first success', async () => {
      const fn = vi.fn().mockResolvedValue('result');

      const result = await withRetry(fn, 'testOperation', DEFAULT_RETRY_CONFIG);

      expect(fn).toHaveBeenCalledTimes(1);
      expect(result).toEqual({ success: true, result: 'result', attempts: 1 });
    });

    it('should retry transient failures and eventually succeed', async () => {
      const fn = vi.fn()
        .mockRejectedValueOnce(networkError('ECONNRESET'))
        .mockRejectedValueOnce(networkError('ETIMEDOUT'))
        .mockResolvedValue('result');

      const config: RetryConfig = { ...FAST, maxRetries: 2 };
      const result = await withRetry(fn, 'testOperation', config);

      expect(fn).toHaveBeenCalledTimes(3);
      expect(result).toEqual({ success: true, result: 'result', attempts: 3 });
    });

    it('should not retry non-transient failures', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('Always fails'));

      const result = await withRetry(fn, 'testOperation', { ...FAST, maxRetries: 3 });

      expect(fn).toHaveBeenCalledTimes(1);
      expect(result.success).toBe(false);
      expect(result.attempts).toBe(1);
    });

    it('should return failure after max retries', async () => {
      const fn = vi.fn().mockRejectedValue(networkError('ECONNREFUSED', 'Always fails'));

      const result = await withRetry(fn, 'testOperation', { ...FAST, maxRetries: 2 });

      expect(fn).toHaveBeenCalledTimes(3); // Initial + 2 retries
      expect(result.success).toBe(false);
      expect(result.success ? undefined : result.error?.message).toBe('Always fails');
    });

    it('should handle non-Error rejections', async () => {
      const fn = vi.fn().mockRejectedValue('string error');

      const result = await withRetry(fn, 'testOperation', { ...FAST, maxRetries: 0 });

      expect(result.success).toBe(false);
      expect(result.success ? undefined : result.error?.message).toBe('string error');
    });
  });

  describe('callExternal', () => {
    it('should retry once and return the result', async () => {
      const fn = vi.fn()
        .mockRejectedValueOnce(networkError('ECONNRESET'))
        .mockResolvedValue(42);

      await expect(callExternal('smtp', fn, { timeoutMs: 100, retry: FAST })).resolves.toBe(42);
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should surface EXTERNAL_SERVICE_ERROR when the service stays down', async () => {
      const cause = networkError('ECONNREFUSED');
      const fn = vi.fn().mockRejectedValue(cause);

      const error: unknown = await callExternal('session-cache', fn, { timeoutMs: 100, retry: FAST })
        .catch((caught: unknown) => caught);

      expect(fn).toHaveBeenCalledTimes(2);
      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({
        kind: 'EXTERNAL_SERVICE_ERROR',
        message: 'session-cache is unavailable',
        statusCode: 503,
        cause,
      });
    });

    it('should turn a hung call into EXTERNAL_SERVICE_ERROR', async () => {
      const fn = vi.fn(() => new Promise<never>(() => undefined));

      await expect(callExternal('cloudinary', fn, { timeoutMs: 10, retry: FAST }))
        .rejects.toMatchObject({ kind: 'EXTERNAL_SERVICE_ERROR' });
      expect(fn).toHaveBeenCalledTimes(2);
    });
  });

  describe('retryTransient', () => {
    it('should retry a dropped connection once and return the result', async () => {
      const fn = vi.fn()
        .mockRejectedValueOnce(networkError('ECONNREFUSED'))
        .mockResolvedValue('row');

      await expect(retryTransient('postgres', fn, FAST)).resolves.toBe('row');
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should surface EXTERNAL_SERVICE_ERROR when storage stays down', async () => {
      const cause = networkError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:5432');
      const fn = vi.fn().mockRejectedValue(cause);

      await expect(retryTransient('postgres', fn, FAST)).rejects.toMatchObject({
        kind: 'EXTERNAL_SERVICE_ERROR',
        message: 'postgres is unavailable',
        cause,
      });
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should rethrow constraint violations untouched without retrying', async () => {
      const violation = Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
      const fn = vi.fn().mockRejectedValue(violation);

      await expect(retryTransient('postgres', fn, FAST)).rejects.toBe(violation);
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });
});
