// Repository error types

/**
 * Base class for all errors raised by this layer.
 * Errors raised by the store itself (constraint violations, connection
 * failures) are not wrapped and reach the caller unchanged.
 */
export class RepositoryError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RepositoryError';
    this.code = code;
  }
}

/**
 * Invalid input, detected before any statement is issued.
 */
export class ValidationError extends RepositoryError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * A required field was omitted on create, or cleared on create or update.
 */
export class EmptyFieldError extends ValidationError {
  constructor(field: string) {
    super(`${field} cannot be empty`, { field });
    this.name = 'EmptyFieldError';
  }
}

/**
 * Environment configuration is missing or malformed.
 */
export class ConfigurationError extends RepositoryError {
  readonly keys: string[];

  constructor(keys: string[], message: string) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
    this.keys = keys;
  }
}
