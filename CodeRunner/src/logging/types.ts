/**
 * JSONL execution log entry, one line per /run_code execution that got past
 * validation.
 */

import type { Language } from '../executor/languages.js';
import type { ExecutionErrorCode } from '../executor/types.js';

export interface ExecutionLogEntry {
  type: 'execution';
  execution_id: string;
  language: Language;
  filename: string;
  code: string;
  status: 'success' | 'error';
  error_code: ExecutionErrorCode | null;
  command_executed: string[] | null;
  return_code: number | null;
  stdout: string;
  stderr: string;
  duration_ms: number;
  workspace: string;
  executed_at: string;
}
