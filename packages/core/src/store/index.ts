/**
 * Persistence Layer
 */

export * from './schema.js';
export * from './graph-store.js';
