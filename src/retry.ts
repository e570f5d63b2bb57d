/**
 * Azure Admin Toolkit - Retry Logic for Transient Failures
 *
 * Exponential or linear (multiplier 1) backoff for:
 * - Rate limiting and transient Azure API errors
 * - Eventual consistency after role assignments, secret creation and deletes
 */

import { logger } from './logging.js';
import { ToolkitError } from './errors.js';

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  jitter?: boolean;
  retryableErrors?: string[];
  /** Overrides the name/message matching when given */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

const DEFAULT_RETRY_OPTIONS: Required<Omit<RetryOptions, 'shouldRetry'>> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
  retryableErrors: [
    'TimeoutError',
    'RateLimitError',
    'NetworkError',
    'TooManyRequests',
    'ServiceUnavailable',
    'InternalServerError',
    'RequestTimeout',
    'ECONNRESET',
    'ETIMEDOUT',
    'ENOTFOUND',
    'RestError',
  ],
  onRetry: () => {},
};

/**
 * Fixed-interval retry used for eventual-consistency waits
 */
export function linearRetry(maxAttempts: number, intervalMs: number): RetryOptions {
  return {
    maxAttempts,
    initialDelayMs: intervalMs,
    maxDelayMs: intervalMs,
    backoffMultiplier: 1,
    jitter: false,
    shouldRetry: () => true,
  };
}

export function isRetryableError(error: unknown, retryableErrors: string[]): boolean {
  if (error instanceof ToolkitError) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const errorStr = `${error.name}:${error.message}`;
    return retryableErrors.some(pattern =>
      errorStr.includes(pattern) || error.name === pattern
    );
  }

  return false;
}

/**
 * Delay for an attempt, capped, with optional ±25% jitter
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
  jitter: boolean = true
): number {
  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  if (!jitter) {
    return cappedDelay;
  }

  const variation = cappedDelay * 0.25 * (Math.random() * 2 - 1);
  return Math.floor(cappedDelay + variation);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Retry a function with backoff
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
  operationName: string = 'operation'
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const shouldRetry = options.shouldRetry ?? ((error: unknown) => isRetryableError(error, opts.retryableErrors));
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      logger.debug(`${operationName}: Attempt ${attempt}/${opts.maxAttempts}`);
      return await fn();
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error)) {
        logger.debug(`${operationName}: Non-retryable error, throwing immediately`, {
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }

      if (attempt === opts.maxAttempts) {
        logger.warn(`${operationName}: Max attempts reached (${opts.maxAttempts}), giving up`, {
          error: error instanceof Error ? error.message : String(error),
        });
        break;
      }

      const delayMs = calculateDelay(
        attempt,
        opts.initialDelayMs,
        opts.maxDelayMs,
        opts.backoffMultiplier,
        opts.jitter
      );

      logger.info(`${operationName}: Retrying after ${delayMs}ms (attempt ${attempt + 1}/${opts.maxAttempts})`, {
        error: error instanceof Error ? error.message : String(error),
        delayMs,
        attempt: attempt + 1,
      });

      opts.onRetry(attempt, error, delayMs);
      await sleep(delayMs);
    }
  }

  throw lastError;
}
