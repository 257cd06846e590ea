import { defineWorkspace } from 'vitest/config';

/**
 * Vitest workspace configuration for the iamgraph monorepo.
 * This enables running tests across all packages with a single command.
 */
export default defineWorkspace([
  // Core package
  {
    extends: './vitest.config.ts',
    test: {
      name: 'iamgraph-core',
      root: './packages/core',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },

  // CLI package
  {
    extends: './vitest.config.ts',
    test: {
      name: 'iamgraph-cli',
      root: './packages/cli',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },
]);
