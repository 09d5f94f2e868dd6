/**
 * @contratos/connector-api
 *
 * Client for the Portal da Transparência REST API
 */

export * from './transparencia/index.js';

// Re-export core types for convenience
export type { Record, Logger } from '@contratos/core';
