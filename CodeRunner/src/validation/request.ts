/**
 * Request validation for /run_code.
 *
 * Turns a parsed JSON body into an ExecutionRequest or throws one of the
 * errors in ./errors.ts. Nothing here touches the filesystem.
 */

import { z } from 'zod';
import type { Workspace } from '../workspace/workspace.js';
import {
  DEFAULT_LANGUAGE,
  SUPPORTED_LANGUAGES,
  isSupportedLanguage,
} from '../executor/languages.js';
import type { ExecutionRequest } from '../executor/types.js';
import {
  InvalidPayloadError,
  MissingFieldError,
  UnsupportedLanguageError,
} from './errors.js';

export const runCodeSchema = z.object({
  code: z.string().nullish(),
  filename: z.string().nullish(),
  language: z.string().nullish(),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateRunRequest(body: unknown, workspace: Workspace): ExecutionRequest {
  if (!isPlainObject(body)) {
    throw new InvalidPayloadError();
  }

  const parsed = runCodeSchema.safeParse(body);
  if (!parsed.success) {
    const fields = parsed.error.errors.map((e) => e.path.join('.'));
    throw new InvalidPayloadError(
      `Invalid field type: ${fields.map((f) => `'${f}'`).join(', ')} must be a string`,
      { fields },
    );
  }

  const { code, filename, language } = parsed.data;

  const missing: string[] = [];
  if (!code) missing.push('code');
  if (!filename) missing.push('filename');
  if (!code || !filename) {
    throw new MissingFieldError(missing);
  }

  const requested = language ?? DEFAULT_LANGUAGE;
  if (!isSupportedLanguage(requested)) {
    throw new UnsupportedLanguageError(requested, SUPPORTED_LANGUAGES);
  }

  // Pure path arithmetic; throws InvalidFilenameError
  workspace.resolve(filename);

  return { code, filename, language: requested };
}
