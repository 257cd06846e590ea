/**
 * Error taxonomy
 *
 * Every failure the engine raises carries a stable code, structured details
 * and a recovery hint. The CLI turns these into one-line messages.
 */

export enum IamGraphErrorCode {
  // Input errors
  POLICY_PARSE = 'POLICY_PARSE',
  QUERY_SYNTAX = 'QUERY_SYNTAX',
  INVALID_CONFIG = 'INVALID_CONFIG',
  RULE_CONFLICT = 'RULE_CONFLICT',

  // Provider errors
  AUTH_FAILED = 'AUTH_FAILED',
  THROTTLED = 'THROTTLED',

  // Storage errors
  STORAGE_FAILED = 'STORAGE_FAILED',
  SNAPSHOT_NOT_FOUND = 'SNAPSHOT_NOT_FOUND',

  // Control flow
  ABORTED = 'ABORTED',
}

export interface RecoveryHint {
  suggestion: string;
  command?: string | undefined;
  retryAfterMs?: number | undefined;
}

export interface IamGraphErrorDetails {
  code: IamGraphErrorCode;
  message: string;
  details?: Record<string, unknown> | undefined;
  recovery?: RecoveryHint | undefined;
  cause?: unknown;
}

export class IamGraphError extends Error {
  public readonly code: IamGraphErrorCode;
  public readonly details?: Record<string, unknown> | undefined;
  public readonly recovery?: RecoveryHint | undefined;

  constructor(errorDetails: IamGraphErrorDetails) {
    super(errorDetails.message, errorDetails.cause !== undefined ? { cause: errorDetails.cause } : undefined);
    this.name = 'IamGraphError';
    this.code = errorDetails.code;
    this.details = errorDetails.details;
    this.recovery = errorDetails.recovery;
  }

  /**
   * Single line suitable for a terminal: message plus the recovery hint
   */
  toOneLine(): string {
    if (!this.recovery) return this.message;
    return `${this.message} (${this.recovery.suggestion})`;
  }
}

/**
 * A policy document or statement failed validation
 */
export class ParseError extends IamGraphError {
  public readonly document: string;
  public readonly fragment: string;

  constructor(document: string, fragment: string, reason: string) {
    super({
      code: IamGraphErrorCode.POLICY_PARSE,
      message: `Malformed policy document '${document}' at ${fragment}: ${reason}`,
      details: { document, fragment, reason },
      recovery: { suggestion: 'Fix the policy document or exclude it from ingestion' },
    });
    this.name = 'ParseError';
    this.document = document;
    this.fragment = fragment;
  }
}

/**
 * A query string could not be parsed
 */
export class QuerySyntaxError extends IamGraphError {
  public readonly position: number;
  public readonly token: string;

  constructor(query: string, position: number, token: string, reason: string) {
    super({
      code: IamGraphErrorCode.QUERY_SYNTAX,
      message: `Query syntax error at position ${position} near '${token}': ${reason}`,
      details: { query, position, token, reason },
      recovery: { suggestion: "See 'iamgraph query --help' for the query grammar" },
    });
    this.name = 'QuerySyntaxError';
    this.position = position;
    this.token = token;
  }
}

/**
 * Credentials were rejected or the caller lacks permission. Never retried.
 */
export class AuthError extends IamGraphError {
  public readonly operation: string;
  public readonly reason: string;

  constructor(operation: string, reason: string, cause?: unknown) {
    super({
      code: IamGraphErrorCode.AUTH_FAILED,
      message: `Authorization failed for ${operation}: ${reason}`,
      details: { operation },
      recovery: { suggestion: 'Check the selected profile and its IAM read permissions' },
      cause,
    });
    this.name = 'AuthError';
    this.operation = operation;
    this.reason = reason;
  }
}

/**
 * The provider kept throttling after the retry budget was spent
 */
export class ThrottleError extends IamGraphError {
  public readonly operation: string;
  public readonly attempts: number;

  constructor(operation: string, attempts: number, cause?: unknown) {
    super({
      code: IamGraphErrorCode.THROTTLED,
      message: `${operation} was throttled after ${attempts} attempt(s)`,
      details: { operation, attempts },
      recovery: {
        suggestion: 'Lower --concurrency or raise IAMGRAPH_MAX_RETRIES and try again',
        retryAfterMs: 30_000,
      },
      cause,
    });
    this.name = 'ThrottleError';
    this.operation = operation;
    this.attempts = attempts;
  }
}

/**
 * Reading, writing or decoding a snapshot failed
 */
export class StorageError extends IamGraphError {
  public readonly filePath: string;

  constructor(filePath: string, reason: string, cause?: unknown, code: IamGraphErrorCode = IamGraphErrorCode.STORAGE_FAILED) {
    super({
      code,
      message: `Storage error for ${filePath}: ${reason}`,
      details: { filePath, reason },
      recovery: code === IamGraphErrorCode.SNAPSHOT_NOT_FOUND
        ? { suggestion: "Run 'iamgraph graph create' first", command: 'iamgraph graph create' }
        : { suggestion: "Re-create the snapshot with 'iamgraph graph create'" },
      cause,
    });
    this.name = 'StorageError';
    this.filePath = filePath;
  }
}

export class ConfigError extends IamGraphError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super({
      code: IamGraphErrorCode.INVALID_CONFIG,
      message: `Invalid configuration: ${reason}`,
      details,
      recovery: { suggestion: 'Check the IAMGRAPH_* environment variables' },
    });
    this.name = 'ConfigError';
  }
}

/**
 * Two escalation rules were registered under the same id
 */
export class DuplicateRuleError extends IamGraphError {
  public readonly ruleId: string;

  constructor(ruleId: string) {
    super({
      code: IamGraphErrorCode.RULE_CONFLICT,
      message: `Escalation rule '${ruleId}' is already registered`,
      details: { ruleId },
      recovery: { suggestion: 'Unregister the existing rule first or choose a different id' },
    });
    this.name = 'DuplicateRuleError';
    this.ruleId = ruleId;
  }
}

export class OperationAbortedError extends IamGraphError {
  constructor(stage: string) {
    super({
      code: IamGraphErrorCode.ABORTED,
      message: `Operation aborted during ${stage}`,
      details: { stage },
    });
    this.name = 'OperationAbortedError';
  }
}

/**
 * Throw if the signal has fired
 */
export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new OperationAbortedError(stage);
  }
}

export function isIamGraphError(error: unknown): error is IamGraphError {
  return error instanceof IamGraphError;
}
