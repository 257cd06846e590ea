/**
 * iamgraph-cli
 */

export { createProgram } from './program.js';
export { exitCodeFor, formatError } from './errors.js';
export * from './commands/index.js';
