/**
 * Languages the runner accepts and the interpreter that runs each of them.
 */

import type { CodeRunnerConfig } from '../config.js';

export const SUPPORTED_LANGUAGES = ['python'] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export const DEFAULT_LANGUAGE: Language = 'python';

/** Interpreter binary (name on PATH or absolute path) per language */
export type InterpreterMap = Record<Language, string>;

export function isSupportedLanguage(value: string): value is Language {
  return SUPPORTED_LANGUAGES.some((lang) => lang === value);
}

export function interpretersFromConfig(config: Pick<CodeRunnerConfig, 'pythonBin'>): InterpreterMap {
  return { python: config.pythonBin };
}

/** argv for running `scriptPath` in `language`; no shell is involved */
export function buildCommand(
  language: Language,
  scriptPath: string,
  interpreters: InterpreterMap,
): string[] {
  return [interpreters[language], scriptPath];
}
