import * as path from 'node:path';

import { describe, it, expect } from 'vitest';
import { ConfigError } from '../errors/errors.js';
import { DEFAULT_CONCURRENCY, DEFAULT_MAX_DEPTH, defaultStorageRoot, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({ XDG_DATA_HOME: '/data' });

    expect(config).toEqual({
      storageRoot: path.join('/data', 'iamgraph'),
      profile: 'default',
      region: 'us-east-1',
      lambdaRegions: ['us-east-1'],
      httpsProxy: undefined,
      maxDepth: DEFAULT_MAX_DEPTH,
      concurrency: DEFAULT_CONCURRENCY,
      requestTimeoutMs: 30_000,
      maxRetries: 5,
      logLevel: 'info',
    });
  });

  it('reads the environment', () => {
    const config = loadConfig({
      IAMGRAPH_STORAGE: '/tmp/graphs',
      AWS_PROFILE: 'prod',
      AWS_DEFAULT_REGION: 'eu-west-1',
      IAMGRAPH_LAMBDA_REGIONS: 'eu-west-1, eu-central-1,',
      https_proxy: 'http://proxy.local:3128',
      IAMGRAPH_MAX_DEPTH: '4',
      IAMGRAPH_LOG_LEVEL: 'debug',
    });

    expect(config).toMatchObject({
      storageRoot: '/tmp/graphs',
      profile: 'prod',
      region: 'eu-west-1',
      lambdaRegions: ['eu-west-1', 'eu-central-1'],
      httpsProxy: 'http://proxy.local:3128',
      maxDepth: 4,
      logLevel: 'debug',
    });
  });

  it('lets overrides win, the region override moving the default Lambda region', () => {
    const config = loadConfig({ AWS_PROFILE: 'prod', AWS_REGION: 'eu-west-1' }, { profile: 'dev', region: 'ap-south-1' });
    expect(config.profile).toBe('dev');
    expect(config.region).toBe('ap-south-1');
    expect(config.lambdaRegions).toEqual(['ap-south-1']);
  });

  it('treats blank variables as unset', () => {
    expect(loadConfig({ AWS_PROFILE: '  ' }).profile).toBe('default');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ IAMGRAPH_MAX_DEPTH: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ IAMGRAPH_LOG_LEVEL: 'loud' })).toThrow(/^Invalid configuration: IAMGRAPH_LOG_LEVEL: /);
    expect(() => loadConfig({}, { concurrency: 0 })).toThrow('Invalid configuration: maxDepth and concurrency must be positive');
  });
});

describe('defaultStorageRoot', () => {
  it('uses XDG_DATA_HOME when set', () => {
    expect(defaultStorageRoot('/xdg')).toBe(path.join('/xdg', 'iamgraph'));
  });
});
