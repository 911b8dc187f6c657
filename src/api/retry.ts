/**
 * Retry logic with exponential backoff for the NetBox client
 *
 * Features:
 * - Exponential backoff with configurable base delay
 * - Jitter to prevent thundering herd
 * - Rate limit handling (HTTP 429)
 * - Validation errors (400/409) are never retried
 */

import type { RetryConfig, RetryResult } from './types.js';
import { logger, type ApiLogger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  retryableStatuses: [429, 500, 502, 503, 504],
};

/**
 * Statuses NetBox uses to reject a request body
 */
export const VALIDATION_STATUSES: readonly number[] = [400, 409];

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a retry operation
 */
export interface RetryOptions<T> extends RetryConfig {
  /** Custom logger instance */
  logger?: ApiLogger;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Custom function to determine if an error is retryable */
  isRetryable?: (error: Error) => boolean;
  /** Called when operation succeeds */
  onSuccess?: (result: T, attempts: number) => void;
  /** Called when all retries are exhausted */
  onExhausted?: (error: Error, attempts: number) => void;
  /** Replace the sleep between attempts (tests) */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Error raised for any non-2xx response from NetBox
 */
export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly details?: Record<string, unknown>;
  public readonly retryAfter?: number;

  constructor(
    message: string,
    status: number,
    options?: {
      details?: Record<string, unknown>;
      retryAfter?: number;
      cause?: Error;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'ApiRequestError';
    this.status = status;
    this.details = options?.details;
    this.retryAfter = options?.retryAfter;
  }

  /**
   * NetBox rejected the request body (field validation, uniqueness,
   * an endpoint already cabled)
   */
  isValidationError(): boolean {
    return VALIDATION_STATUSES.includes(this.status);
  }
}

/**
 * Type guard for the validation/conflict class of remote errors
 */
export function isValidationError(error: unknown): error is ApiRequestError {
  return error instanceof ApiRequestError && error.isValidationError();
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay for a retry attempt using exponential backoff
 *
 * @param attempt - The current attempt number (1-indexed)
 * @param retryAfter - Optional Retry-After header value (seconds)
 * @returns Delay in milliseconds
 */
export function calculateDelay(
  attempt: number,
  config: Required<RetryConfig>,
  retryAfter?: number
): number {
  // If rate-limited with Retry-After header, use that (converted to ms)
  if (retryAfter !== undefined && retryAfter > 0) {
    const jitter = Math.random() * config.baseDelayMs * config.jitterFactor;
    return Math.min(retryAfter * 1000 + jitter, config.maxDelayMs);
  }

  // Exponential backoff: baseDelay * 2^(attempt-1)
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1);

  const jitter =
    Math.random() * exponentialDelay * config.jitterFactor * 2 -
    exponentialDelay * config.jitterFactor;

  const delayWithJitter = exponentialDelay + jitter;

  return Math.min(Math.max(delayWithJitter, 0), config.maxDelayMs);
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Retry Logic
// =============================================================================

/**
 * Check if an error is retryable based on configuration
 */
export function isRetryableError(
  error: Error,
  config: Required<RetryConfig>
): boolean {
  // Network errors are retryable
  if (error.name === 'TypeError' && error.message.includes('fetch')) {
    return true;
  }

  // Timeout
  if (error.name === 'AbortError') {
    return true;
  }

  if (error instanceof ApiRequestError) {
    return config.retryableStatuses.includes(error.status);
  }

  const networkErrorPatterns = [
    'ECONNRESET',
    'ECONNREFUSED',
    'ETIMEDOUT',
    'ENOTFOUND',
    'EAI_AGAIN',
    'socket hang up',
  ];

  const message = error.message.toLowerCase();
  return networkErrorPatterns.some((pattern) =>
    message.includes(pattern.toLowerCase())
  );
}

/**
 * Parse Retry-After header value
 *
 * @param value - Header value (seconds as number or HTTP-date)
 * @returns Delay in seconds, or undefined if not parseable
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;

  const seconds = parseInt(value, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds;
  }

  const date = new Date(value);
  const delayMs = date.getTime() - Date.now();
  if (!isNaN(delayMs) && delayMs > 0) {
    return Math.ceil(delayMs / 1000);
  }

  return undefined;
}

/**
 * Execute a function with retry logic
 *
 * @returns RetryResult with success/failure and metadata
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions<T> = {}
): Promise<RetryResult<T>> {
  const config: Required<RetryConfig> = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
    retryableStatuses: options.retryableStatuses ?? DEFAULT_RETRY_CONFIG.retryableStatuses,
  };

  const log = options.logger ?? logger;
  const wait = options.sleep ?? sleep;
  const startTime = Date.now();
  let lastError: Error = new Error('Unknown error');

  for (let attempt = 1; attempt <= config.maxRetries + 1; attempt++) {
    try {
      const result = await fn();

      const totalTimeMs = Date.now() - startTime;
      if (attempt > 1) {
        log.info(`Request succeeded after ${attempt} attempts`, {
          attempts: attempt,
          totalTimeMs,
        });
      }

      options.onSuccess?.(result, attempt);

      return {
        success: true,
        data: result,
        attempts: attempt,
        totalTimeMs,
      };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      const isRetryable = options.isRetryable
        ? options.isRetryable(lastError)
        : isRetryableError(lastError, config);

      const isLastAttempt = attempt > config.maxRetries;

      if (!isRetryable || isLastAttempt) {
        const totalTimeMs = Date.now() - startTime;

        if (isLastAttempt && config.maxRetries > 0) {
          log.warn(`All ${config.maxRetries} retry attempts exhausted`, {
            error: lastError.message,
            attempts: attempt,
            totalTimeMs,
          });
          options.onExhausted?.(lastError, attempt);
        } else if (!isRetryable) {
          log.debug('Error is not retryable', {
            error: lastError.message,
            attempts: attempt,
          });
        }

        return {
          success: false,
          error: lastError,
          attempts: attempt,
          totalTimeMs,
        };
      }

      const retryAfter =
        lastError instanceof ApiRequestError ? lastError.retryAfter : undefined;

      const delayMs = calculateDelay(attempt, config, retryAfter);

      log.info(
        `Retry attempt ${attempt}/${config.maxRetries} in ${Math.round(delayMs)}ms`,
        {
          error: lastError.message,
          status: lastError instanceof ApiRequestError ? lastError.status : undefined,
          delayMs: Math.round(delayMs),
        }
      );

      options.onRetry?.(attempt, lastError, delayMs);

      await wait(delayMs);
    }
  }

  return {
    success: false,
    error: lastError,
    attempts: config.maxRetries + 1,
    totalTimeMs: Date.now() - startTime,
  };
}
