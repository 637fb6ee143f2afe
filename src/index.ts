/**
 * rulenest - nested rule orchestration.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Rules
export * from './core/rules/index.js';

// Cache
export * from './core/cache/index.js';

// Inheritance
export * from './core/inheritance/index.js';

// Composition
export * from './core/composition/index.js';

// Validation
export * from './core/validation/index.js';

// Graph
export * from './core/graph/index.js';

// Orchestration session
export * from './core/orchestrator.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
