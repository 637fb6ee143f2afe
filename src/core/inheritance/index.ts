/**
 * Inheritance exports.
 */
export * from './types.js';
export * from './naming.js';
export * from './resolver.js';
