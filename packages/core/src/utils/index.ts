export * from './sort.js';
export * from './freeze.js';
