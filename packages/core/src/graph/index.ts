/**
 * Principal Graph
 */

export * from './types.js';
export * from './principal-graph.js';
export * from './graph-builder.js';
