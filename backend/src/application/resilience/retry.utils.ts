/**
 * Retry Utilities with Exponential Backoff + Jitter
 * External calls (cache, email, avatar host) get one retry on transient
 * network failures and a hard timeout. Storage calls get the retry only;
 * the pg pool enforces its own timeouts.
 */

import { createLogger } from '../../infrastructure/logging/logger.js';
import { externalServiceError } from '../errors/app-error.js';

const logger = createLogger('retry-utils');

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;  // 0-1, amount of randomness to add
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 1,
  baseDelayMs: 100,
  maxDelayMs: 2000,
  jitterFactor: 0.3,
};

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ESOCKET',
  'ECONNECTION',
  // PostgreSQL: connection failures and server shutdown
  '08000',
  '08001',
  '08003',
  '08006',
  '57P01',
  '57P03',
]);

export class TimeoutError extends Error {
  readonly code = 'ETIMEDOUT';

  constructor(operationName: string, timeoutMs: number) {
    super(`${operationName} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Calculate delay with exponential backoff and jitter
 * Formula: min(maxDelay, baseDelay * 2^attempt) * (1 + random * jitter)
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);
  const jitter = 1 + (Math.random() * config.jitterFactor * 2 - config.jitterFactor);

  return Math.round(cappedDelay * jitter);
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Network-level failures worth one more attempt. Application errors are not.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' && TRANSIENT_ERROR_CODES.has(code)) {
    return true;
  }
  const message = error instanceof Error ? error.message : '';
  if (/timed? ?out|connection (is )?closed|connection terminated|socket hang up/i.test(message)) {
    return true;
  }
  // Drivers and ORMs may wrap the network error
  return 'cause' in error && error.cause !== error && isTransientError(error.cause);
}

/**
 * Reject if the operation does not settle in time
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  operationName: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operationName, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export type RetryResult<T> =
  | { success: true; result: T; attempts: number }
  | { success: false; error?: Error; attempts: number };

/**
 * Execute function with retries. Only errors accepted by `shouldRetry` are retried.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  operationName: string,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (error: unknown) => boolean = isTransientError
): Promise<RetryResult<T>> {
  let lastError: Error | undefined;
  let attempts = 0;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    attempts = attempt + 1;
    try {
      const result = await operation();

      if (attempt > 0) {
        logger.info({
          operation: operationName,
          attempts,
        }, 'Operation succeeded after retry');
      }

      return { success: true, result, attempts };

    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt < config.maxRetries && shouldRetry(error)) {
        const delay = calculateBackoffDelay(attempt, config);

        logger.warn({
          operation: operationName,
          attempt: attempts,
          maxRetries: config.maxRetries,
          nextRetryDelayMs: delay,
          error: lastError.message,
        }, 'Operation failed, retrying...');

        await sleep(delay);
      } else {
        break;
      }
    }
  }

  logger.error({
    operation: operationName,
    attempts,
    error: lastError?.message,
  }, 'Operation failed');

  return lastError
    ? { success: false, error: lastError, attempts }
    : { success: false, attempts };
}

export interface ExternalCallOptions {
  timeoutMs: number;
  retry?: RetryConfig;
}

/**
 * Run a call against an external service: timeout per attempt, one retry on
 * transient failures, and an EXTERNAL_SERVICE_ERROR when it still fails.
 */
export async function callExternal<T>(
  service: string,
  operation: () => Promise<T>,
  options: ExternalCallOptions
): Promise<T> {
  const outcome = await withRetry(
    () => withTimeout(operation(), options.timeoutMs, service),
    service,
    options.retry ?? DEFAULT_RETRY_CONFIG
  );

  if (outcome.success) {
    return outcome.result;
  }
  throw externalServiceError(service, outcome.error);
}

/**
 * One retry on transient failures for calls whose driver already enforces
 * timeouts. A failure that is still transient becomes EXTERNAL_SERVICE_ERROR;
 * anything else (constraint violations, application errors) is rethrown as is.
 */
export async function retryTransient<T>(
  service: string,
  operation: () => Promise<T>,
  retry: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
  const outcome = await withRetry(operation, service, retry);

  if (outcome.success) {
    return outcome.result;
  }
  if (outcome.error && !isTransientError(outcome.error)) {
    throw outcome.error;
  }
  throw externalServiceError(service, outcome.error);
}
