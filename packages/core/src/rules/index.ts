/**
 * Privilege-Escalation Rule Engine
 */

export * from './types.js';
export * from './helpers.js';
export * from './account-view.js';
export * from './catalog/index.js';
export * from './registry.js';
export * from './rule-engine.js';
