/**
 * iamgraph-core - IAM privilege-escalation graph engine
 *
 * This package provides:
 * - Ingestion: identities and policies from AWS or an offline export
 * - Resolver: effective permissions per principal
 * - Rules: privilege-escalation rule registry and engine
 * - Graph: builder and frozen principal graph
 * - Query: query language and path finder
 * - Store: snapshot persistence per profile and account
 */

export { VERSION } from './version.js';

// Errors and logging
export * from './errors/index.js';
export * from './logging/index.js';

// Configuration
export * from './config/index.js';

// Policy model
export * from './policy/index.js';

// Utilities
export * from './utils/index.js';

// Permission resolution
export * from './resolver/index.js';

// Ingestion
export * from './ingestion/index.js';

// Rules
export * from './rules/index.js';

// Graph
export * from './graph/index.js';

// Query
export * from './query/index.js';

// Persistence
export * from './store/index.js';

// Export
export * from './render/index.js';

// Orchestration
export * from './pipeline/index.js';
