/**
 * Execution engine: materialize → build argv → run → report.
 *
 * The engine owns no global state; the workspace it writes into is handed in,
 * so every caller (and every test) decides which directory is shared.
 */

import { Logger } from '@coderunner/shared/Utils/logger.js';
import { ValidationError } from '@coderunner/shared/Types/errors.js';
import { getStrippedEnv, type CleanupPolicy, type CodeRunnerConfig } from '../config.js';
import type { Workspace } from '../workspace/workspace.js';
import { generateExecutionId } from '../utils/id-generator.js';
import type { TruncateConfig } from '../utils/output-truncate.js';
import { logExecution } from '../logging/writer.js';
import { buildCommand, interpretersFromConfig, type InterpreterMap } from './languages.js';
import { runProcess } from './subprocess.js';
import type {
  ExecutionFailure,
  ExecutionRequest,
  ExecutionResult,
  ProcessOutcome,
} from './types.js';

export interface ExecutionEngineOptions {
  interpreters: InterpreterMap;
  /** 0 disables the bound */
  timeoutMs: number;
  killGraceMs: number;
  cleanup: CleanupPolicy;
  truncation: TruncateConfig;
  /** Environment for the child; defaults to the stripped host environment */
  env?: Record<string, string>;
  /** Directory for the JSONL execution log; null disables it */
  execLogDir: string | null;
  logger?: Logger;
}

export function engineOptionsFromConfig(config: CodeRunnerConfig): ExecutionEngineOptions {
  return {
    interpreters: interpretersFromConfig(config),
    timeoutMs: config.timeoutMs,
    killGraceMs: config.killGraceMs,
    cleanup: config.cleanup,
    truncation: {
      maxChars: config.maxOutputChars,
      head: config.truncationHead,
      tail: config.truncationTail,
    },
    execLogDir: config.execLogEnabled ? config.logDir : null,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ExecutionEngine {
  private readonly workspace: Workspace;
  private readonly options: ExecutionEngineOptions;
  private readonly logger: Logger;
  private readonly pendingLogs = new Set<Promise<void>>();

  constructor(workspace: Workspace, options: ExecutionEngineOptions) {
    this.workspace = workspace;
    this.options = options;
    this.logger = options.logger ?? new Logger('coderunner:engine');
  }

  async run(request: ExecutionRequest): Promise<ExecutionResult> {
    const executionId = generateExecutionId();

    // 1. Materialize
    let scriptPath: string;
    try {
      scriptPath = await this.workspace.write(request.filename, request.code);
    } catch (err) {
      if (err instanceof ValidationError) throw err;

      this.logger.error(`Failed to write ${request.filename}`, err);
      const failure: ExecutionFailure = {
        status: 'error',
        execution_id: executionId,
        error: `Failed to write code to file: ${errorMessage(err)}`,
        error_code: 'WRITE_FAILED',
        stdout: '',
        stderr: '',
        duration_ms: 0,
      };
      this.record(request, failure);
      return failure;
    }
    this.logger.debug(`Code written to ${scriptPath}`, { execution_id: executionId });

    // 2. Build command
    const command = buildCommand(request.language, scriptPath, this.options.interpreters);

    // 3. Execute
    this.logger.info(`Executing ${command.join(' ')}`, { execution_id: executionId });
    let outcome: ProcessOutcome;
    try {
      outcome = await runProcess(command, {
        cwd: this.workspace.root,
        env: this.options.env ?? getStrippedEnv(),
        timeoutMs: this.options.timeoutMs,
        killGraceMs: this.options.killGraceMs,
        capture: this.options.truncation,
      });
    } catch (err) {
      // spawn() throws synchronously on malformed arguments
      outcome = { kind: 'spawn_failed', message: errorMessage(err), durationMs: 0 };
    } finally {
      await this.cleanupFile(request.filename);
    }

    // 4. Report
    const result = this.toResult(executionId, command, outcome);
    if (result.status === 'success') {
      this.logger.info(`Finished ${request.filename} with return code ${result.return_code}`, {
        execution_id: executionId,
        duration_ms: result.duration_ms,
      });
    } else {
      this.logger.error(`Execution of ${request.filename} failed: ${result.error}`, {
        execution_id: executionId,
        error_code: result.error_code,
      });
    }
    this.record(request, result);
    return result;
  }

  /** Wait for execution log writes that are still in flight */
  async flushLogs(): Promise<void> {
    await Promise.all([...this.pendingLogs]);
  }

  private toResult(executionId: string, command: string[], outcome: ProcessOutcome): ExecutionResult {
    if (outcome.kind === 'spawn_failed') {
      return {
        status: 'error',
        execution_id: executionId,
        error: `Failed to start ${command[0]}: ${outcome.message}`,
        error_code: 'SPAWN_FAILED',
        stdout: '',
        stderr: '',
        command_executed: command,
        duration_ms: outcome.durationMs,
      };
    }

    if (outcome.kind === 'timed_out') {
      return {
        status: 'error',
        execution_id: executionId,
        error: `Execution timed out after ${this.options.timeoutMs} ms`,
        error_code: 'TIMED_OUT',
        stdout: outcome.stdout,
        stderr: outcome.stderr,
        command_executed: command,
        duration_ms: outcome.durationMs,
        timed_out: true,
        truncated: outcome.truncated,
      };
    }

    return {
      status: 'success',
      execution_id: executionId,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
      command_executed: command,
      return_code: outcome.exitCode,
      duration_ms: outcome.durationMs,
      truncated: outcome.truncated,
    };
  }

  private async cleanupFile(filename: string): Promise<void> {
    if (this.options.cleanup === 'keep') return;
    try {
      await this.workspace.remove(filename);
    } catch (err) {
      // The response is already decided; a stale file is only worth a warning
      this.logger.warn(`Failed to remove ${filename}`, err);
    }
  }

  private record(request: ExecutionRequest, result: ExecutionResult): void {
    const logDir = this.options.execLogDir;
    if (!logDir) return;

    const write = logExecution(logDir, {
      type: 'execution',
      execution_id: result.execution_id,
      language: request.language,
      filename: request.filename,
      code: request.code,
      status: result.status,
      error_code: result.status === 'error' ? result.error_code : null,
      command_executed: result.command_executed ?? null,
      return_code: result.status === 'success' ? result.return_code : null,
      stdout: result.stdout,
      stderr: result.stderr,
      duration_ms: result.duration_ms,
      workspace: this.workspace.root,
      executed_at: new Date().toISOString(),
    })
      .catch((err: unknown) => this.logger.error('Execution log write failed', err))
      .finally(() => this.pendingLogs.delete(write));

    this.pendingLogs.add(write);
  }
}
