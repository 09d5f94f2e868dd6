/**
 * @contratos/core
 *
 * Shared record types, errors and logging for the contratos packages
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Logging
export * from './logging/index.js';

// Utilities
export * from './utils/index.js';
