/**
 * Rejections raised before anything touches the workspace.
 */

import { ValidationError } from '@coderunner/shared/Types/errors.js';

export class InvalidPayloadError extends ValidationError {
  constructor(message: string = 'Invalid JSON payload', details?: unknown) {
    super(message, details, 'INVALID_PAYLOAD');
    this.name = 'InvalidPayloadError';
  }
}

export class MissingFieldError extends ValidationError {
  constructor(fields: string[]) {
    const quoted = fields.map((f) => `'${f}'`).join(', ');
    const noun = fields.length === 1 ? 'field' : 'fields';
    super(`Missing required ${noun}: ${quoted}`, { fields }, 'MISSING_FIELD');
    this.name = 'MissingFieldError';
  }
}

export class UnsupportedLanguageError extends ValidationError {
  constructor(language: string, supported: readonly string[]) {
    super(`Unsupported language: ${language}`, { language, supported: [...supported] }, 'UNSUPPORTED_LANGUAGE');
    this.name = 'UnsupportedLanguageError';
  }
}

export class InvalidFilenameError extends ValidationError {
  constructor(filename: string, reason: string) {
    super(`Invalid filename: ${reason}`, { filename }, 'INVALID_FILENAME');
    this.name = 'InvalidFilenameError';
  }
}
