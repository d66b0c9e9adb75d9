import { BaseError } from './errors.js';

/**
 * Error payload returned by every HTTP endpoint on failure.
 */
export interface ErrorBody {
  error: string;
  error_code: string;
  details?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build an error body from a message and a code.
 */
export function createErrorBody(
  error: string,
  errorCode: string,
  details?: Record<string, unknown>,
): ErrorBody {
  const body: ErrorBody = { error, error_code: errorCode };
  if (details !== undefined) body.details = details;
  return body;
}

/**
 * Build an error body from a caught exception.
 * BaseError subclasses keep their code and object-shaped details; other
 * errors collapse to INTERNAL_ERROR. Stack traces are never included.
 */
export function toErrorBody(error: unknown): ErrorBody {
  if (error instanceof BaseError) {
    return createErrorBody(
      error.message,
      error.code,
      isRecord(error.details) ? error.details : undefined,
    );
  }

  if (error instanceof Error) {
    return createErrorBody(error.message, 'INTERNAL_ERROR');
  }

  if (typeof error === 'string') {
    return createErrorBody(error, 'UNKNOWN_ERROR');
  }

  return createErrorBody('Unknown error occurred', 'UNKNOWN_ERROR');
}
