/**
 * Argquery Command - iamgraph argquery
 *
 * The can/who queries built from flags instead of query text.
 */

import { Command } from 'commander';
import { createContext } from '../context.js';
import { addQueryOptions, runQuery, type QueryRunOptions } from './query.js';

interface ArgQueryOptions extends QueryRunOptions {
  principal?: string | undefined;
  action: string;
  resource?: string | undefined;
}

/**
 * Quote a term for the query language
 */
export function quoteTerm(value: string): string {
  return value.includes('"') ? `'${value}'` : `"${value}"`;
}

export function buildArgQuery(args: { principal?: string | undefined; action: string; resource?: string | undefined }): string {
  const resource = quoteTerm(args.resource ?? '*');
  const action = quoteTerm(args.action);
  return args.principal !== undefined
    ? `can ${quoteTerm(args.principal)} do ${action} with ${resource}`
    : `who can do ${action} with ${resource}`;
}

export function createArgQueryCommand(): Command {
  const command = new Command('argquery')
    .description('Ask who can perform an action, or whether a principal can')
    .option('-P, --principal <selector>', 'Principal selector (default: every principal)')
    .requiredOption('-A, --action <action>', 'Action, e.g. iam:PassRole')
    .option('-R, --resource <resource>', 'Resource ARN or pattern', '*');

  addQueryOptions(command).action(async (options: ArgQueryOptions, self: Command) => {
    await runQuery(createContext(self), buildArgQuery(options), options);
  });

  return command;
}
