/**
 * AWS Retry Strategy
 *
 * Exponential backoff with jitter for provider calls. Throttling and
 * transient server failures are retried; authorization failures are
 * permanent and surface immediately as AuthError.
 */

import { AuthError, ThrottleError, throwIfAborted } from '../errors/errors.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  retryableErrors: string[];
  authErrors: string[];
  jitterFactor: number;
  logger: Logger;
  signal?: AbortSignal | undefined;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 5,
  baseDelayMs: 100,
  maxDelayMs: 5000,
  retryableErrors: [
    'ThrottlingException',
    'Throttling',
    'TooManyRequestsException',
    'RequestLimitExceeded',
    'ServiceUnavailable',
    'ServiceUnavailableException',
    'InternalError',
    'InternalServiceError',
    'InternalServerError',
    'RequestTimeout',
    'RequestTimeoutException',
    'IDPCommunicationError',
    'LimitExceededException',
    'SlowDown',
    'PriorRequestNotComplete',
    'TimeoutError',
  ],
  authErrors: [
    'AccessDenied',
    'AccessDeniedException',
    'UnauthorizedOperation',
    'InvalidClientTokenId',
    'ExpiredToken',
    'ExpiredTokenException',
    'SignatureDoesNotMatch',
    'UnrecognizedClientException',
    'CredentialsProviderError',
  ],
  jitterFactor: 0.2,
  logger: silentLogger,
};

const NETWORK_ERROR_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNREFUSED', 'EPIPE']);

/**
 * The fields of an SDK error the retry policy looks at
 */
export interface ProviderErrorShape {
  name?: string | undefined;
  code?: string | undefined;
  message: string;
  statusCode?: number | undefined;
}

function readString(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

/**
 * Pull name, code and HTTP status out of whatever was thrown
 */
export function describeProviderError(error: unknown): ProviderErrorShape {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }

  const metadata: unknown = Reflect.get(error, '$metadata');
  let statusCode: number | undefined;
  if (typeof metadata === 'object' && metadata !== null) {
    const status: unknown = Reflect.get(metadata, 'httpStatusCode');
    statusCode = typeof status === 'number' ? status : undefined;
  }

  return {
    name: readString(error, 'name'),
    code: readString(error, 'code') ?? readString(error, 'Code'),
    message: readString(error, 'message') ?? String(error),
    statusCode,
  };
}

export function isAuthFailure(error: unknown, config: Pick<RetryConfig, 'authErrors'> = DEFAULT_RETRY_CONFIG): boolean {
  const shape = describeProviderError(error);
  if (shape.name !== undefined && config.authErrors.includes(shape.name)) return true;
  if (shape.code !== undefined && config.authErrors.includes(shape.code)) return true;
  return shape.statusCode === 401 || shape.statusCode === 403;
}

export function isRetryableError(
  error: unknown,
  config: Pick<RetryConfig, 'retryableErrors'> = DEFAULT_RETRY_CONFIG
): boolean {
  const shape = describeProviderError(error);
  if (shape.name !== undefined && config.retryableErrors.includes(shape.name)) return true;
  if (shape.code !== undefined && config.retryableErrors.includes(shape.code)) return true;
  if (shape.code !== undefined && NETWORK_ERROR_CODES.has(shape.code)) return true;
  if (shape.statusCode !== undefined) {
    return shape.statusCode === 429 || shape.statusCode >= 500;
  }
  return false;
}

/**
 * Delay for an attempt: base * 2^attempt, capped, with +/- jitter
 */
export function calculateDelay(
  attempt: number,
  config: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs' | 'jitterFactor'>,
  random: () => number = Math.random
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);
  const jitter = cappedDelay * config.jitterFactor * (random() * 2 - 1);
  return Math.max(0, cappedDelay + jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a provider call with retry logic
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  operationName: string,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const fullConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const { logger, signal } = fullConfig;

  for (let attempt = 0; ; attempt++) {
    throwIfAborted(signal, operationName);
    try {
      return await operation();
    } catch (error) {
      throwIfAborted(signal, operationName);
      if (isAuthFailure(error, fullConfig)) {
        throw new AuthError(operationName, describeProviderError(error).message, error);
      }
      if (!isRetryableError(error, fullConfig)) {
        throw error;
      }
      if (attempt >= fullConfig.maxRetries) {
        throw new ThrottleError(operationName, attempt + 1, error);
      }

      const delay = calculateDelay(attempt, fullConfig);
      const shape = describeProviderError(error);
      logger.debug(
        `[Retry] ${operationName} failed (attempt ${attempt + 1}/${fullConfig.maxRetries + 1}), retrying in ${Math.round(delay)}ms`,
        { errorName: shape.name, errorCode: shape.code, statusCode: shape.statusCode }
      );
      await sleep(delay);
    }
  }
}
