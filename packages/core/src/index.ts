/**
 * @relecov-mapper/core
 *
 * Shared types, errors, configuration model and logging for the metadata mapper
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Configuration schema and compiler
export * from './validation/index.js';

// Logging
export * from './logging/index.js';

// Utilities
export * from './utils/index.js';
