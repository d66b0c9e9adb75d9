/**
 * JSONL execution log with daily rotation: <logDir>/executions-YYYY-MM-DD.jsonl
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExecutionLogEntry } from './types.js';

export function executionLogPath(logDir: string, at: Date = new Date()): string {
  const date = at.toISOString().slice(0, 10); // YYYY-MM-DD
  return join(logDir, `executions-${date}.jsonl`);
}

/**
 * Append one entry. Rejects on filesystem errors; callers that must not block
 * on the log attach their own catch.
 */
export async function logExecution(logDir: string, entry: ExecutionLogEntry): Promise<void> {
  await mkdir(logDir, { recursive: true });
  const filepath = executionLogPath(logDir, new Date(entry.executed_at));
  await appendFile(filepath, JSON.stringify(entry) + '\n', 'utf-8');
}
