/**
 * Query Command - iamgraph query
 *
 * Runs a query against the stored graph of the profile.
 */

import { Command } from 'commander';
import {
  QueryEngine,
  createPermissionLookup,
  serializeQueryResult,
  type QueryResult,
} from 'iamgraph-core';
import { createContext, type CliContext, type OutputFormat } from '../context.js';
import { parsePositiveInt } from '../errors.js';
import { formatQueryResult } from '../ui/format.js';
import { formatOption } from './graph.js';

export interface QueryRunOptions {
  account?: string | undefined;
  maxDepth?: number | undefined;
  maxPaths?: number | undefined;
  format: OutputFormat;
}

/**
 * Load the snapshot, run the query and print the result
 */
export async function runQuery(ctx: CliContext, query: string, options: QueryRunOptions): Promise<QueryResult> {
  const snapshot = await ctx.store.load(ctx.config.profile, options.account);
  const engine = new QueryEngine(snapshot.graph, createPermissionLookup(snapshot.resolutionCache));
  const result = engine.execute(query, {
    maxDepth: options.maxDepth ?? ctx.config.maxDepth,
    maxPaths: options.maxPaths,
  });

  if (options.format === 'json') {
    console.log(serializeQueryResult(result));
  } else {
    for (const line of formatQueryResult(result, snapshot.graph)) console.log(line);
  }
  return result;
}

interface QueryOptions extends QueryRunOptions {
  search: string;
}

export function addQueryOptions(command: Command): Command {
  return command
    .option('--account <id>', 'Account id (default: most recent graph of the profile)')
    .option('--max-depth <n>', 'Maximum path length', parsePositiveInt)
    .option('--max-paths <n>', 'Stop after this many paths', parsePositiveInt)
    .addOption(formatOption());
}

export function createQueryCommand(): Command {
  const command = new Command('query')
    .description('Query the stored graph')
    .requiredOption('-s, --search <query>', "Query, e.g. \"preset privesc *\" or \"can user/alice do s3:GetObject\"");

  addQueryOptions(command).action(async (options: QueryOptions, self: Command) => {
    await runQuery(createContext(self), options.search, options);
  });

  command.addHelpText(
    'after',
    `
Queries:
  preset privesc [selector]              Non-admin principals that can escalate
  preset admin [selector]                Administrator principals
  preset connected [source] [target]     Paths between principals
  can <principal> do <action> [with <resource>]
  can <principal> reach <principal>
  who can do <action> [with <resource>]
Any query may end with "depth N".
`
  );

  return command;
}
