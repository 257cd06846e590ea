/**
 * Commands module exports
 *
 * Exports all CLI commands for registration with Commander.js
 */

export { createGraphCommand } from './graph.js';
export { createQueryCommand } from './query.js';
export { createArgQueryCommand } from './argquery.js';
export { createVisualizeCommand } from './visualize.js';
