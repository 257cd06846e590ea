/**
 * Pipeline
 */

export * from './create-graph.js';
