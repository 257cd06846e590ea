import { describe, it, expect, vi } from 'vitest';
import { AuthError, OperationAbortedError, ThrottleError } from '../errors/errors.js';
import {
  calculateDelay,
  describeProviderError,
  isAuthFailure,
  isRetryableError,
  withRetry,
} from './aws-retry.js';

function providerError(name: string, statusCode?: number): Error {
  const error = new Error(`${name} happened`);
  error.name = name;
  if (statusCode !== undefined) {
    Object.assign(error, { $metadata: { httpStatusCode: statusCode } });
  }
  return error;
}

describe('error classification', () => {
  it('reads name, code and status from SDK errors', () => {
    const error = Object.assign(providerError('Throttling', 400), { code: 'Throttling' });
    expect(describeProviderError(error)).toEqual({
      name: 'Throttling',
      code: 'Throttling',
      message: 'Throttling happened',
      statusCode: 400,
    });
    expect(describeProviderError('boom')).toEqual({ message: 'boom' });
  });

  it('classifies throttling, server and network failures as retryable', () => {
    expect(isRetryableError(providerError('ThrottlingException'))).toBe(true);
    expect(isRetryableError(providerError('Whatever', 503))).toBe(true);
    expect(isRetryableError(providerError('Whatever', 429))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))).toBe(true);
    expect(isRetryableError(providerError('NoSuchEntity', 404))).toBe(false);
  });

  it('classifies credential failures as auth failures', () => {
    expect(isAuthFailure(providerError('AccessDenied'))).toBe(true);
    expect(isAuthFailure(providerError('Whatever', 403))).toBe(true);
    expect(isAuthFailure(providerError('ThrottlingException', 400))).toBe(false);
  });
});

describe('calculateDelay', () => {
  const config = { baseDelayMs: 100, maxDelayMs: 1000, jitterFactor: 0.2 };

  it('doubles per attempt and caps', () => {
    expect(calculateDelay(0, config, () => 0.5)).toBe(100);
    expect(calculateDelay(2, config, () => 0.5)).toBe(400);
    expect(calculateDelay(10, config, () => 0.5)).toBe(1000);
  });

  it('applies jitter in both directions', () => {
    expect(calculateDelay(0, config, () => 0)).toBe(80);
    expect(calculateDelay(0, config, () => 1)).toBe(120);
  });
});

describe('withRetry', () => {
  it('retries throttling until the call succeeds', async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(providerError('ThrottlingException'))
      .mockRejectedValueOnce(providerError('ServiceUnavailable'))
      .mockResolvedValue('ok');

    await expect(withRetry(operation, 'GetAccountAuthorizationDetails', { baseDelayMs: 0 })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('throws ThrottleError once the retry budget is spent', async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(providerError('ThrottlingException'));

    const error = await withRetry(operation, 'ListRoles', { baseDelayMs: 0, maxRetries: 2 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ThrottleError);
    expect(error).toMatchObject({ attempts: 3, operation: 'ListRoles' });
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('never retries authorization failures', async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(providerError('AccessDenied'));

    const error = await withRetry(operation, 'ListUsers', { baseDelayMs: 0 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ message: 'Authorization failed for ListUsers: AccessDenied happened' });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('rethrows other errors untouched', async () => {
    const original = providerError('NoSuchEntity', 404);
    await expect(withRetry(() => Promise.reject(original), 'GetRole', { baseDelayMs: 0 })).rejects.toBe(original);
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn<() => Promise<string>>().mockResolvedValue('ok');

    await expect(withRetry(operation, 'ListRoles', { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationAbortedError
    );
    expect(operation).not.toHaveBeenCalled();
  });
});
