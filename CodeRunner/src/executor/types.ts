/**
 * Core types for code execution.
 */

import type { Language } from './languages.js';

export interface ExecutionRequest {
  code: string;
  /** Bare file name, already checked against the workspace */
  filename: string;
  language: Language;
}

export type ExecutionErrorCode = 'WRITE_FAILED' | 'SPAWN_FAILED' | 'TIMED_OUT';

/**
 * The child ran to completion. A non-zero return_code is still a success of
 * the runner; callers inspect return_code and stderr for the program's own
 * failure.
 */
export interface ExecutionSuccess {
  status: 'success';
  execution_id: string;
  stdout: string;
  stderr: string;
  command_executed: string[];
  return_code: number;
  duration_ms: number;
  truncated: boolean;
}

/** The runner itself could not carry the execution through. */
export interface ExecutionFailure {
  status: 'error';
  execution_id: string;
  error: string;
  error_code: ExecutionErrorCode;
  stdout: string;
  stderr: string;
  /** Absent when the file could not be written */
  command_executed?: string[];
  duration_ms: number;
  timed_out?: true;
  /** Set on TIMED_OUT, where partial output is returned */
  truncated?: boolean;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

/** What a finished child process looked like, before it is shaped into a result */
export type ProcessOutcome =
  | {
      kind: 'exited';
      exitCode: number;
      stdout: string;
      stderr: string;
      truncated: boolean;
      durationMs: number;
    }
  | {
      kind: 'timed_out';
      stdout: string;
      stderr: string;
      truncated: boolean;
      durationMs: number;
    }
  | {
      kind: 'spawn_failed';
      message: string;
      errno?: string;
      durationMs: number;
    };
