/**
 * canon-check library exports.
 */

// Configuration
export * from './core/config/index.js';

// Checks
export * from './core/checks/index.js';

// Tools
export * from './core/tools/index.js';

// Validation
export * from './core/validation/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
