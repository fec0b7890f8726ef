/**
 * Custom error classes and error handling utilities
 */

/**
 * Base error class for domain errors
 */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SyncError';
  }
}

/**
 * Drive API related errors (network, quota, missing files)
 */
export class DriveError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DRIVE_ERROR', context);
    this.name = 'DriveError';
  }
}

/**
 * Credential or permission failures. Always fatal for a run.
 */
export class AuthError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'AUTH_ERROR', context);
    this.name = 'AuthError';
  }
}

/**
 * Text extraction failures (corrupt or unreadable documents)
 */
export class ExtractionError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'EXTRACTION_ERROR', context);
    this.name = 'ExtractionError';
  }
}

/**
 * Ledger persistence errors
 */
export class LedgerError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'LEDGER_ERROR', context);
    this.name = 'LedgerError';
  }
}

/**
 * Invalid or missing configuration
 */
export class ConfigError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/**
 * Another run holds the folder lock
 */
export class LockError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'LOCK_ERROR', context);
    this.name = 'LockError';
  }
}

/**
 * Retry configuration
 */
export interface RetryConfig {
  maxRetries: number;
  delayMs: number;
  exponentialBackoff?: boolean;
  /**
   * Return false to fail immediately instead of retrying
   */
  shouldRetry?: (error: Error) => boolean;
}

/**
 * Retry a function with exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = { maxRetries: 3, delayMs: 1000, exponentialBackoff: true }
): Promise<T> {
  let lastError: Error = new Error('withRetry called with maxRetries < 1');

  for (let attempt = 0; attempt < config.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = toError(error);

      if (config.shouldRetry && !config.shouldRetry(lastError)) {
        break;
      }

      // Don't retry on last attempt
      if (attempt === config.maxRetries - 1) {
        break;
      }

      const delay = config.exponentialBackoff
        ? config.delayMs * Math.pow(2, attempt)
        : config.delayMs;

      console.warn(
        `Attempt ${attempt + 1}/${config.maxRetries} failed. Retrying in ${delay}ms...`,
        {
          error: lastError.message,
        }
      );

      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}

/**
 * Extract an HTTP status from a Google API (gaxios) error, if it carries one
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }

  if ('response' in error) {
    const response = error.response;
    if (response && typeof response === 'object' && 'status' in response) {
      const status = response.status;
      if (typeof status === 'number') {
        return status;
      }
    }
  }

  if ('code' in error) {
    const code = error.code;
    if (typeof code === 'number') {
      return code;
    }
    if (typeof code === 'string' && /^\d{3}$/.test(code)) {
      return parseInt(code, 10);
    }
  }

  return undefined;
}

/**
 * 4xx responses other than 408, 429 and rate-limit 403s will not succeed on
 * a second attempt
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof AuthError || error instanceof ConfigError) {
    return false;
  }

  const status = httpStatusOf(error);
  if (status === undefined) {
    return true;
  }

  // Drive reports per-user rate limiting as 403
  if (status === 403) {
    return /rate limit/i.test(error.message);
  }

  return status === 408 || status === 429 || status >= 500;
}

/**
 * The credentials themselves were rejected: a 401, or a token endpoint error
 */
export function isCredentialFailure(error: unknown): boolean {
  if (httpStatusOf(error) === 401) {
    return true;
  }

  if (error instanceof Error) {
    return /invalid_grant|invalid_client|unauthorized_client/.test(error.message);
  }

  return false;
}

/**
 * Credential failures, plus 403s that are not about quota or a single
 * file's own restrictions
 */
export function isAuthFailure(error: unknown): boolean {
  if (isCredentialFailure(error)) {
    return true;
  }

  if (httpStatusOf(error) === 403) {
    const message = error instanceof Error ? error.message : '';
    return !/rate limit|quota|too large|cannot ?download/i.test(message);
  }

  return false;
}

/**
 * Normalize any thrown value into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  if (typeof error === 'string') {
    return new Error(error);
  }

  if (error && typeof error === 'object' && 'message' in error) {
    const message = error.message;
    if (typeof message === 'string') {
      return new Error(message);
    }
  }

  return new Error(`Unknown error: ${String(error)}`);
}

/**
 * Log structured error
 */
export function logError(error: Error, context?: Record<string, unknown>): void {
  const errorData: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
    timestamp: new Date().toISOString(),
    ...context,
  };

  if (error instanceof SyncError) {
    errorData.code = error.code;
    errorData.context = error.context;
  }

  console.error('Error occurred:', JSON.stringify(errorData, null, 2));
}

/**
 * Error summary for reporting
 */
export interface ErrorSummary {
  totalErrors: number;
  errors: Array<{
    type: string;
    message: string;
    timestamp: string;
    context?: Record<string, unknown>;
  }>;
}

/**
 * Error collector for aggregating errors during sync
 */
export class ErrorCollector {
  private errors: ErrorSummary['errors'] = [];

  addError(error: Error, context?: Record<string, unknown>): void {
    this.errors.push({
      type: error.name,
      message: error.message,
      timestamp: new Date().toISOString(),
      context,
    });
  }

  getSummary(): ErrorSummary {
    return {
      totalErrors: this.errors.length,
      errors: this.errors,
    };
  }
}
