/**
 * Query Engine
 */

export * from './tokenizer.js';
export * from './ast.js';
export * from './parser.js';
export * from './path-finder.js';
export * from './query-engine.js';
