/**
 * context-ablation library exports.
 */

// Configuration
export * from './core/config/index.js';

// Registry and randomness
export * from './core/registry/index.js';
export * from './core/random/index.js';

// Tasks and trials
export * from './core/tasks/index.js';
export * from './core/simulate/index.js';
export * from './core/harness/index.js';
export * from './core/trials/index.js';

// Analysis and reporting
export * from './core/analysis/index.js';
export * from './core/report/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
