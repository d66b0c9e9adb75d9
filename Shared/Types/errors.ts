/**
 * Base error class for the code runner packages.
 * Carries a machine-readable code that ends up in the `error_code` field of
 * HTTP error bodies.
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'BaseError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Configuration-related errors (invalid env vars, unusable directories, etc.)
 */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Input validation errors. Subclasses narrow the code to a specific rejection.
 */
export class ValidationError extends BaseError {
  constructor(message: string, details?: unknown, code: string = 'VALIDATION_ERROR') {
    super(message, code, details);
    this.name = 'ValidationError';
  }
}
