/**
 * Shared fixtures for CodeRunner tests.
 *
 * The Node binary running the tests stands in for the Python interpreter so
 * the suites do not depend on a python3 install; snippets are therefore
 * JavaScript even when the file is called *.py.
 */

import { mkdir, realpath, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import type { ExecutionEngineOptions } from '../../src/executor/engine.js';

export const STAND_IN_INTERPRETER = process.execPath;

/** Fresh directory under the OS temp dir, symlinks resolved */
export async function makeTempDir(prefix: string): Promise<string> {
  const dir = join(tmpdir(), `coderunner-${prefix}-${randomUUID().slice(0, 8)}`);
  await mkdir(dir, { recursive: true });
  return realpath(dir);
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function testEngineOptions(
  overrides: Partial<ExecutionEngineOptions> = {},
): ExecutionEngineOptions {
  return {
    interpreters: { python: STAND_IN_INTERPRETER },
    timeoutMs: 10_000,
    killGraceMs: 1_000,
    cleanup: 'remove',
    truncation: { maxChars: 100_000, head: 40_000, tail: 40_000 },
    execLogDir: null,
    ...overrides,
  };
}
