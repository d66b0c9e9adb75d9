/**
 * Child process runner.
 *
 * Spawns argv directly (no shell) and resolves once the process is gone:
 * - stdin closed, stdout/stderr decoded as UTF-8 and bounded while they arrive
 * - optional timeout (SIGTERM → grace → SIGKILL)
 * - spawn failures (missing or non-executable interpreter) resolved, not thrown
 */

import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import { OutputCapture, type TruncateConfig } from '../utils/output-truncate.js';
import type { ProcessOutcome } from './types.js';

export interface RunProcessOptions {
  cwd: string;
  env: Record<string, string>;
  /** 0 disables the bound */
  timeoutMs: number;
  killGraceMs: number;
  /** Per-stream capture limits */
  capture: TruncateConfig;
}

/** Python-style return code for a child that died from a signal */
function signalReturnCode(signal: NodeJS.Signals | null): number {
  if (!signal) return -1;
  const num = constants.signals[signal];
  return typeof num === 'number' ? -num : -1;
}

export function runProcess(argv: string[], options: RunProcessOptions): Promise<ProcessOutcome> {
  const [command, ...args] = argv;
  const startTime = Date.now();

  if (!command) {
    return Promise.resolve({
      kind: 'spawn_failed',
      message: 'Empty command',
      durationMs: 0,
    });
  }

  return new Promise<ProcessOutcome>((resolve) => {
    const stdoutCapture = new OutputCapture(options.capture);
    const stderrCapture = new OutputCapture(options.capture);
    let timedOut = false;
    let settled = false;
    let timeoutTimer: ReturnType<typeof setTimeout> | null = null;
    let killTimer: ReturnType<typeof setTimeout> | null = null;

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    child.stdout.on('data', (chunk: Buffer) => stdoutCapture.write(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderrCapture.write(chunk));

    const clearTimers = (): void => {
      if (timeoutTimer) clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);
    };

    // ENOENT, EACCES and friends
    child.on('error', (err: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      clearTimers();

      resolve({
        kind: 'spawn_failed',
        message: err.message,
        errno: err.code,
        durationMs: Date.now() - startTime,
      });
    });

    child.on('close', (code, signal) => {
      if (settled) return;
      settled = true;
      clearTimers();

      const stdout = stdoutCapture.finish();
      const stderr = stderrCapture.finish();
      const output = {
        stdout: stdout.text,
        stderr: stderr.text,
        truncated: stdout.truncated || stderr.truncated,
        durationMs: Date.now() - startTime,
      };

      if (timedOut) {
        resolve({ kind: 'timed_out', ...output });
        return;
      }

      resolve({ kind: 'exited', exitCode: code ?? signalReturnCode(signal), ...output });
    });

    if (options.timeoutMs > 0) {
      timeoutTimer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');

        killTimer = setTimeout(() => {
          // No-op (returns false) once the child has exited
          child.kill('SIGKILL');
        }, options.killGraceMs);
      }, options.timeoutMs);
    }
  });
}
