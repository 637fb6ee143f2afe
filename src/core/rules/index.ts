/**
 * Rule document exports.
 */
export * from './types.js';
export * from './parser.js';
export * from './loader.js';
export * from './source.js';
export * from './dependencies.js';
