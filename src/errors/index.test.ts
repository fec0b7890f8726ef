/**
 * Tests for Error Handling utilities
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  SyncError,
  DriveError,
  AuthError,
  ExtractionError,
  LedgerError,
  ConfigError,
  LockError,
  withRetry,
  logError,
  ErrorCollector,
  toError,
  httpStatusOf,
  isRetryableError,
  isAuthFailure,
  isCredentialFailure,
} from './index.js';

function gaxiosLikeError(status: number, message = `Request failed with status ${status}`) {
  return Object.assign(new Error(message), { response: { status } });
}

describe('Custom Error Classes', () => {
  it('should create SyncError with code and context', () => {
    const error = new SyncError('Test error', 'TEST_CODE', { fileId: '123' });

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.context).toEqual({ fileId: '123' });
    expect(error.name).toBe('SyncError');
  });

  it('should create DriveError', () => {
    const error = new DriveError('Drive failed', { fileId: '456' });

    expect(error.message).toBe('Drive failed');
    expect(error.code).toBe('DRIVE_ERROR');
    expect(error.name).toBe('DriveError');
    expect(error).toBeInstanceOf(SyncError);
  });

  it.each([
    [new AuthError('a'), 'AUTH_ERROR', 'AuthError'],
    [new ExtractionError('e'), 'EXTRACTION_ERROR', 'ExtractionError'],
    [new LedgerError('l'), 'LEDGER_ERROR', 'LedgerError'],
    [new ConfigError('c'), 'CONFIG_ERROR', 'ConfigError'],
    [new LockError('k'), 'LOCK_ERROR', 'LockError'],
  ])('should create %s with its code', (error, code, name) => {
    expect(error.code).toBe(code);
    expect(error.name).toBe(name);
  });
});

describe('withRetry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should succeed on first attempt', async () => {
    const fn = vi.fn().mockResolvedValue('success');

    const result = await withRetry(fn, { maxRetries: 3, delayMs: 1000 });

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry up to 3 times and succeed', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('Fail 1'))
      .mockRejectedValueOnce(new Error('Fail 2'))
      .mockResolvedValue('success');

    const promise = withRetry(fn, {
      maxRetries: 3,
      delayMs: 1000,
      exponentialBackoff: true,
    });

    await vi.runAllTimersAsync();
    const result = await promise;

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should throw error after max retries', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('Always fails'));

    const promise = withRetry(fn, { maxRetries: 3, delayMs: 100 });

    const expectation = expect(promise).rejects.toThrow('Always fails');
    await vi.runAllTimersAsync();
    await expectation;

    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should double the delay between attempts', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('Fail'));

    const promise = withRetry(fn, {
      maxRetries: 3,
      delayMs: 1000,
      exponentialBackoff: true,
    });
    const expectation = expect(promise).rejects.toThrow('Fail');

    await vi.advanceTimersByTimeAsync(999);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1999);
    expect(fn).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(3);

    await expectation;
  });

  it('should stop immediately when shouldRetry rejects the error', async () => {
    const fn = vi.fn().mockRejectedValue(gaxiosLikeError(404));

    await expect(
      withRetry(fn, { maxRetries: 3, delayMs: 100, shouldRetry: isRetryableError })
    ).rejects.toThrow('Request failed with status 404');

    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should wrap non-Error rejections', async () => {
    const fn = vi.fn().mockRejectedValue('plain string');

    await expect(withRetry(fn, { maxRetries: 1, delayMs: 0 })).rejects.toThrow('plain string');
  });
});

describe('httpStatusOf', () => {
  it('should read response.status', () => {
    expect(httpStatusOf(gaxiosLikeError(503))).toBe(503);
  });

  it('should read numeric and numeric-string codes', () => {
    expect(httpStatusOf({ code: 429 })).toBe(429);
    expect(httpStatusOf({ code: '404' })).toBe(404);
  });

  it('should ignore non-numeric codes', () => {
    expect(httpStatusOf({ code: 'ECONNRESET' })).toBeUndefined();
    expect(httpStatusOf(null)).toBeUndefined();
  });
});

describe('isRetryableError', () => {
  it('should retry network errors without a status', () => {
    expect(isRetryableError(new Error('socket hang up'))).toBe(true);
  });

  it('should retry rate limits, timeouts and server errors', () => {
    expect(isRetryableError(gaxiosLikeError(429))).toBe(true);
    expect(isRetryableError(gaxiosLikeError(408))).toBe(true);
    expect(isRetryableError(gaxiosLikeError(500))).toBe(true);
  });

  it('should retry 403s only when they report a rate limit', () => {
    expect(isRetryableError(gaxiosLikeError(403, 'User rate limit exceeded'))).toBe(true);
    expect(isRetryableError(gaxiosLikeError(403, 'The caller does not have permission'))).toBe(false);
  });

  it('should not retry other client errors or auth failures', () => {
    expect(isRetryableError(gaxiosLikeError(404))).toBe(false);
    expect(isRetryableError(new AuthError('bad key'))).toBe(false);
  });
});

describe('isAuthFailure', () => {
  it('should flag 401 responses', () => {
    expect(isAuthFailure(gaxiosLikeError(401))).toBe(true);
  });

  it('should flag permission 403s but not quota 403s', () => {
    expect(isAuthFailure(gaxiosLikeError(403, 'The caller does not have permission'))).toBe(true);
    expect(isAuthFailure(gaxiosLikeError(403, 'User rate limit exceeded'))).toBe(false);
    expect(isAuthFailure(gaxiosLikeError(403, 'This file is too large to be exported.'))).toBe(false);
  });

  it('should flag OAuth grant errors', () => {
    expect(isAuthFailure(new Error('invalid_grant: account not found'))).toBe(true);
    expect(isAuthFailure(new Error('timeout'))).toBe(false);
  });
});

describe('isCredentialFailure', () => {
  it('should flag rejected credentials only', () => {
    expect(isCredentialFailure(gaxiosLikeError(401))).toBe(true);
    expect(isCredentialFailure(new Error('invalid_client: no such client'))).toBe(true);
    expect(
      isCredentialFailure(
        gaxiosLikeError(403, 'The user does not have sufficient permissions for file f-1.')
      )
    ).toBe(false);
    expect(isCredentialFailure(gaxiosLikeError(404, 'File not found: f-1.'))).toBe(false);
  });
});

describe('logError', () => {
  it('should log error with context', () => {
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const error = new Error('Test error');
    logError(error, { fileId: '123', operation: 'test' });

    expect(consoleErrorSpy).toHaveBeenCalled();
    const loggedData = JSON.parse(String(consoleErrorSpy.mock.calls[0][1]));

    expect(loggedData.message).toBe('Test error');
    expect(loggedData.fileId).toBe('123');
    expect(loggedData.operation).toBe('test');
    expect(loggedData.timestamp).toBeDefined();

    consoleErrorSpy.mockRestore();
  });

  it('should log SyncError with code and context', () => {
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const error = new DriveError('Drive error', { fileId: '456' });
    logError(error);

    const loggedData = JSON.parse(String(consoleErrorSpy.mock.calls[0][1]));

    expect(loggedData.code).toBe('DRIVE_ERROR');
    expect(loggedData.context).toEqual({ fileId: '456' });

    consoleErrorSpy.mockRestore();
  });
});

describe('ErrorCollector', () => {
  let collector: ErrorCollector;

  beforeEach(() => {
    collector = new ErrorCollector();
  });

  it('should collect errors', () => {
    collector.addError(new Error('Error 1'));
    collector.addError(new DriveError('Error 2'), { fileId: 'f-1' });

    const summary = collector.getSummary();
    expect(summary.totalErrors).toBe(2);
    expect(summary.errors[0].message).toBe('Error 1');
    expect(summary.errors[1].type).toBe('DriveError');
    expect(summary.errors[1].context).toEqual({ fileId: 'f-1' });
  });
});

describe('toError', () => {
  it('should return Error as-is', () => {
    const error = new Error('Test error');

    expect(toError(error)).toBe(error);
  });

  it('should convert strings and error-like objects', () => {
    expect(toError('String error').message).toBe('String error');
    expect(toError({ message: 'Error-like message', code: 500 }).message).toBe(
      'Error-like message'
    );
  });

  it('should describe unknown values', () => {
    expect(toError(null).message).toBe('Unknown error: null');
    expect(toError(404).message).toBe('Unknown error: 404');
    expect(toError({ foo: 'bar' }).message).toBe('Unknown error: [object Object]');
  });
});
