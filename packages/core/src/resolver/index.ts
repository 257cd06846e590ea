/**
 * Permission Resolver
 */

export * from './types.js';
export * from './policy-hash.js';
export * from './permission-resolver.js';
export * from './resource-policy.js';
export * from './resolution-cache.js';
