/**
 * Composition exports.
 */
export * from './types.js';
export * from './merge.js';
export * from './engine.js';
export * from './renderer.js';
