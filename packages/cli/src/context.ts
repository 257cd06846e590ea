/**
 * Per-invocation context built from global options and the environment
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import {
  GraphStore,
  loadConfig,
  type ConfigOverrides,
  type IamGraphConfig,
  type Logger,
} from 'iamgraph-core';
import { createCliLogger } from './ui/logger.js';

export interface GlobalOptions {
  profile?: string | undefined;
  storage?: string | undefined;
  region?: string | undefined;
  verbose?: boolean | undefined;
  color?: boolean | undefined;
}

export interface CliContext {
  config: IamGraphConfig;
  logger: Logger;
  store: GraphStore;
}

export type OutputFormat = 'text' | 'json';

export function createContext(
  command: Command,
  overrides: ConfigOverrides = {},
  env: Record<string, string | undefined> = process.env
): CliContext {
  const globals = command.optsWithGlobals<GlobalOptions>();
  if (globals.color === false) {
    chalk.level = 0;
  }

  const config = loadConfig(env, {
    profile: globals.profile,
    storageRoot: globals.storage,
    region: globals.region,
    logLevel: globals.verbose ? 'debug' : undefined,
    ...overrides,
  });
  const logger = createCliLogger(config.logLevel);

  return { config, logger, store: new GraphStore(config.storageRoot, { logger }) };
}
