export * from './errors.js';
export * from './warnings.js';
