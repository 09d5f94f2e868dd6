/**
 * Pipeline Error Types
 */

export type ContractsErrorCode = 'MAPPING_ERROR' | 'INVALID_OPTIONS' | 'PERSIST_FAILED';

export interface ContractsErrorDetails {
  code: ContractsErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class ContractsError extends Error {
  readonly code: ContractsErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ContractsErrorDetails) {
    super(details.message);
    this.name = 'ContractsError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}
