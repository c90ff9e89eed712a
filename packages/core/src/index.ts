/**
 * @billing-audit/core
 *
 * Shared row types, the read-only source connector contract and
 * in-memory filtering used by every data source.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Utilities
export * from './utils/index.js';
