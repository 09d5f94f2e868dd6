export { ContractsError } from './contracts-error.js';
export type { ContractsErrorCode, ContractsErrorDetails } from './contracts-error.js';
