/**
 * Identity & Policy Ingestion
 */

export * from './types.js';
export * from './identity-api.js';
export * from './aws-retry.js';
export * from './worker-pool.js';
export * from './aws-identity-api.js';
export * from './authorization-details.js';
export * from './identity-source.js';
export * from './sources.js';
