/**
 * Error reporting and exit codes
 *
 * 0 success, 1 fatal error, 2 usage or query syntax error.
 */

import { CommanderError, InvalidArgumentError } from 'commander';
import { ConfigError, QuerySyntaxError, isIamGraphError } from 'iamgraph-core';

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? 0 : EXIT_USAGE;
  }
  if (error instanceof QuerySyntaxError || error instanceof ConfigError) {
    return EXIT_USAGE;
  }
  return EXIT_FAILURE;
}

/**
 * One-line message for stderr
 */
export function formatError(error: unknown): string {
  if (isIamGraphError(error)) return `Error: ${error.toOneLine()}`;
  if (error instanceof Error) return `Error: ${error.message}`;
  return 'Error: an unexpected error occurred';
}

/**
 * Option parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < 1) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}
