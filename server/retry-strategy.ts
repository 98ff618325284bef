/**
 * Retry Strategy with Exponential Backoff
 *
 * Handles transient failures (quota, timeouts) of the analysis services.
 * Gives up on permanent failures (validation errors, blocked content) immediately.
 */

import { AppError, JobTimeoutError, toAppError } from './error-handling';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  jitter?: boolean; // Add randomness to prevent thundering herd
  onRetry?: (attempt: number, delay: number, error: Error) => void;
  sleep?: Sleep;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
  onRetry: () => {},
  sleep,
};

/**
 * Retry a function with exponential backoff
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: AppError = toAppError(new Error('Unknown error'));

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = toAppError(error);

      // Don't retry non-retryable errors
      if (!lastError.isRetryable() || attempt === opts.maxRetries) {
        throw lastError;
      }

      let delay = opts.initialDelayMs * Math.pow(opts.backoffMultiplier, attempt);
      delay = Math.min(delay, opts.maxDelayMs);

      // ±10% randomness
      if (opts.jitter) {
        const jitterAmount = delay * 0.1;
        delay += (Math.random() - 0.5) * 2 * jitterAmount;
      }

      opts.onRetry(attempt + 1, delay, lastError.originalError ?? lastError);
      await opts.sleep(Math.round(delay));
    }
  }

  throw lastError;
}

/**
 * Retry wrapper for service calls with logging
 */
export async function callWithRetry<T>(
  name: string, // For logging: "Identifier", "ObjectStorage", etc.
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  return retryWithBackoff(fn, {
    ...options,
    onRetry: (attempt, delay, error) => {
      console.warn(
        `[${name}] Retry ${attempt} after ${Math.round(delay)}ms. Error: ${error.message}`
      );
      options.onRetry?.(attempt, delay, error);
    },
  });
}

/**
 * Timeout wrapper. The timer is cleared as soon as the promise settles.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  createError: (timeoutMs: number) => Error = (ms) => new JobTimeoutError(ms),
  onTimeout?: () => void,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout?.();
      reject(createError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Retry specific services with predefined configuration
 */
export const SERVICE_RETRY_CONFIGS = {
  identifier: {
    maxRetries: 2,
    initialDelayMs: 1000,
    maxDelayMs: 8000,
    backoffMultiplier: 2,
    jitter: true,
  },
  objectStorage: {
    maxRetries: 2,
    initialDelayMs: 500,
    maxDelayMs: 4000,
    backoffMultiplier: 2,
    jitter: true,
  },
} satisfies Record<string, RetryOptions>;

export async function callIdentifierWithRetry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  return callWithRetry('Identifier', fn, { ...SERVICE_RETRY_CONFIGS.identifier, ...options });
}

export async function callStorageWithRetry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  return callWithRetry('ObjectStorage', fn, { ...SERVICE_RETRY_CONFIGS.objectStorage, ...options });
}
