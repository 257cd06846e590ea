/**
 * Render
 */

export * from './dot-renderer.js';
