/**
 * Graph Command - iamgraph graph
 *
 * Build and inspect stored principal graphs.
 *
 * Commands:
 * - iamgraph graph create   - Ingest an account and store its graph
 * - iamgraph graph list     - List stored graphs
 * - iamgraph graph display  - Show statistics of a stored graph
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import {
  createAwsIdentitySource,
  createFileIdentitySource,
  createGraph,
  type IdentitySource,
} from 'iamgraph-core';
import { createContext, type OutputFormat } from '../context.js';
import { parsePositiveInt } from '../errors.js';
import { formatMetadata, formatStats, formatWarningSummary } from '../ui/format.js';
import { createSpinner } from '../ui/spinner.js';

export const formatOption = (): Option =>
  new Option('-f, --format <format>', 'Output format').choices(['text', 'json']).default('text');

// ============================================================================
// Create
// ============================================================================

interface CreateOptions {
  fromFile?: string | undefined;
  concurrency?: number | undefined;
  format: OutputFormat;
}

async function createAction(options: CreateOptions, command: Command): Promise<void> {
  const ctx = createContext(command, { concurrency: options.concurrency });
  const { config, logger, store } = ctx;
  const isText = options.format === 'text';

  const source: IdentitySource = options.fromFile
    ? await createFileIdentitySource(options.fromFile)
    : createAwsIdentitySource(config);

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  const spinner = isText ? createSpinner(`Building graph from ${source.describe()}...`) : null;
  spinner?.start();

  try {
    const result = await createGraph({
      profile: config.profile,
      source,
      store,
      logger,
      concurrency: config.concurrency,
      signal: controller.signal,
    });
    spinner?.succeed(`Stored graph for account ${result.metadata.accountId}`);

    if (!isText) {
      console.log(JSON.stringify({
        metadata: result.metadata,
        stats: result.stats,
        warnings: result.warnings,
        snapshotPath: result.snapshotPath,
      }, null, 2));
      return;
    }

    console.log();
    for (const line of formatStats(result.stats.graph)) console.log(line);
    console.log(chalk.gray(`Snapshot:    ${result.snapshotPath ?? '-'}`));
    const summary = formatWarningSummary(result.warnings);
    if (summary.length > 0) {
      console.log();
      for (const line of summary) console.log(line);
    }
    console.log();
  } catch (error) {
    spinner?.fail('Graph creation failed');
    throw error;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

// ============================================================================
// List
// ============================================================================

interface ListOptions {
  format: OutputFormat;
}

async function listAction(options: ListOptions, command: Command): Promise<void> {
  const { store } = createContext(command);
  const snapshots = await store.list();

  if (options.format === 'json') {
    console.log(JSON.stringify(snapshots, null, 2));
    return;
  }

  if (snapshots.length === 0) {
    console.log(chalk.yellow('No graphs stored.'));
    console.log(chalk.gray('Run `iamgraph graph create` to build one.'));
    return;
  }

  console.log(chalk.gray('Profile'.padEnd(20) + 'Account'.padEnd(16) + 'Generated'));
  for (const metadata of snapshots) {
    console.log(metadata.profile.padEnd(20) + metadata.accountId.padEnd(16) + chalk.gray(metadata.generatedAt));
  }
}

// ============================================================================
// Display
// ============================================================================

interface DisplayOptions {
  account?: string | undefined;
  format: OutputFormat;
}

async function displayAction(options: DisplayOptions, command: Command): Promise<void> {
  const { config, store } = createContext(command);
  const snapshot = await store.load(config.profile, options.account);
  const stats = snapshot.graph.stats();

  if (options.format === 'json') {
    console.log(JSON.stringify({ metadata: snapshot.metadata, stats }, null, 2));
    return;
  }

  for (const line of formatMetadata(snapshot.metadata)) console.log(line);
  for (const line of formatStats(stats)) console.log(line);

  const admins = snapshot.graph.nodes().filter(node => node.isAdmin);
  if (admins.length > 0) {
    console.log();
    console.log(chalk.bold('Administrators:'));
    for (const node of admins) console.log(`  ${chalk.red(node.searchableName)}`);
  }
  const summary = formatWarningSummary(snapshot.graph.warnings());
  if (summary.length > 0) {
    console.log();
    for (const line of summary) console.log(line);
  }
}

// ============================================================================
// Command
// ============================================================================

export function createGraphCommand(): Command {
  const graph = new Command('graph').description('Build and inspect principal graphs');

  graph
    .command('create')
    .description('Ingest identities and policies, then store the graph')
    .option('--from-file <file>', 'Read an authorization-details export instead of calling AWS')
    .option('--concurrency <n>', 'Maximum provider calls in flight', parsePositiveInt)
    .addOption(formatOption())
    .action(createAction);

  graph
    .command('list')
    .description('List stored graphs')
    .addOption(formatOption())
    .action(listAction);

  graph
    .command('display')
    .description('Show statistics of the stored graph for the profile')
    .option('--account <id>', 'Account id (default: most recent graph of the profile)')
    .addOption(formatOption())
    .action(displayAction);

  return graph;
}
