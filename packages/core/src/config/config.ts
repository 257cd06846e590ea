/**
 * Configuration
 *
 * Reads the environment once, validates it with zod and hands back a plain
 * object. Callers pass the result down explicitly.
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';

import { ConfigError } from '../errors/errors.js';
import type { LogLevel } from '../logging/logger.js';

export const DEFAULT_MAX_DEPTH = 8;
export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_PROFILE = 'default';

export interface IamGraphConfig {
  /** Directory holding persisted snapshots */
  storageRoot: string;
  /** Named credential profile */
  profile: string;
  /** Region for regional API calls */
  region: string;
  /** Regions searched for Lambda functions */
  lambdaRegions: string[];
  /** Proxy for outbound HTTPS calls */
  httpsProxy?: string | undefined;
  maxDepth: number;
  concurrency: number;
  requestTimeoutMs: number;
  maxRetries: number;
  logLevel: LogLevel;
}

const optionalString = z
  .string()
  .trim()
  .transform(value => (value.length === 0 ? undefined : value))
  .optional();

const regionList = z
  .string()
  .optional()
  .transform(value =>
    (value ?? '')
      .split(',')
      .map(region => region.trim())
      .filter(region => region.length > 0)
  );

const EnvSchema = z.object({
  IAMGRAPH_STORAGE: optionalString,
  AWS_PROFILE: optionalString,
  AWS_REGION: optionalString,
  AWS_DEFAULT_REGION: optionalString,
  IAMGRAPH_LAMBDA_REGIONS: regionList,
  HTTPS_PROXY: optionalString,
  https_proxy: optionalString,
  HTTP_PROXY: optionalString,
  http_proxy: optionalString,
  XDG_DATA_HOME: optionalString,
  IAMGRAPH_MAX_DEPTH: z.coerce.number().int().min(1).max(64).default(DEFAULT_MAX_DEPTH),
  IAMGRAPH_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(DEFAULT_CONCURRENCY),
  IAMGRAPH_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(100).default(DEFAULT_REQUEST_TIMEOUT_MS),
  IAMGRAPH_MAX_RETRIES: z.coerce.number().int().min(0).max(20).default(DEFAULT_MAX_RETRIES),
  IAMGRAPH_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

export type ConfigOverrides = Partial<IamGraphConfig>;

/**
 * Default storage root: $XDG_DATA_HOME/iamgraph or ~/.local/share/iamgraph
 */
export function defaultStorageRoot(xdgDataHome?: string): string {
  const base = xdgDataHome ?? path.join(os.homedir(), '.local', 'share');
  return path.join(base, 'iamgraph');
}

/**
 * Build the configuration from an environment map plus explicit overrides
 * (command-line flags win over the environment).
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {}
): IamGraphConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(issues.join('; '), { issues });
  }

  const vars = parsed.data;
  const region = vars.AWS_REGION ?? vars.AWS_DEFAULT_REGION ?? DEFAULT_REGION;

  const base: IamGraphConfig = {
    storageRoot: vars.IAMGRAPH_STORAGE ?? defaultStorageRoot(vars.XDG_DATA_HOME),
    profile: vars.AWS_PROFILE ?? DEFAULT_PROFILE,
    region,
    lambdaRegions: vars.IAMGRAPH_LAMBDA_REGIONS.length > 0 ? vars.IAMGRAPH_LAMBDA_REGIONS : [region],
    httpsProxy: vars.HTTPS_PROXY ?? vars.https_proxy ?? vars.HTTP_PROXY ?? vars.http_proxy,
    maxDepth: vars.IAMGRAPH_MAX_DEPTH,
    concurrency: vars.IAMGRAPH_CONCURRENCY,
    requestTimeoutMs: vars.IAMGRAPH_REQUEST_TIMEOUT_MS,
    maxRetries: vars.IAMGRAPH_MAX_RETRIES,
    logLevel: vars.IAMGRAPH_LOG_LEVEL,
  };

  const merged: IamGraphConfig = {
    storageRoot: overrides.storageRoot ?? base.storageRoot,
    profile: overrides.profile ?? base.profile,
    region: overrides.region ?? base.region,
    lambdaRegions:
      overrides.lambdaRegions ??
      (vars.IAMGRAPH_LAMBDA_REGIONS.length > 0 ? base.lambdaRegions : [overrides.region ?? base.region]),
    httpsProxy: overrides.httpsProxy ?? base.httpsProxy,
    maxDepth: overrides.maxDepth ?? base.maxDepth,
    concurrency: overrides.concurrency ?? base.concurrency,
    requestTimeoutMs: overrides.requestTimeoutMs ?? base.requestTimeoutMs,
    maxRetries: overrides.maxRetries ?? base.maxRetries,
    logLevel: overrides.logLevel ?? base.logLevel,
  };

  if (merged.maxDepth < 1 || merged.concurrency < 1) {
    throw new ConfigError('maxDepth and concurrency must be positive', {
      maxDepth: merged.maxDepth,
      concurrency: merged.concurrency,
    });
  }

  return merged;
}
