/**
 * NetBox API client module
 *
 * Provides:
 * - NetboxClient with per-resource CRUD sub-clients
 * - Retry logic with exponential backoff
 * - JSON logging with secret redaction
 * - Type definitions for the NetBox objects the reconciler touches
 */

export { createClient, RESOURCE_PATHS } from './client.js';
export type { NetboxClient, ResourceClient } from './client.js';

export {
  withRetry,
  ApiRequestError,
  isValidationError,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  sleep,
  DEFAULT_RETRY_CONFIG,
  VALIDATION_STATUSES,
} from './retry.js';
export type { RetryOptions } from './retry.js';

export {
  logger,
  createLogger,
  parseLogLevel,
  ApiLogger,
  redactString,
  redactPatterns,
  redactObject,
  redactValue,
  redactHeaders,
} from './logger.js';
export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

export type * from './types.js';
