/**
 * CodeRunner Configuration
 *
 * Zod-validated environment config and the reduced environment handed to
 * executed code.
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { ConfigurationError } from '@coderunner/shared/Types/errors.js';

// ── Schema ───────────────────────────────────────────────────────────────────

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const configSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.coerce.number().int().min(0).max(65535).default(5000),
  workspaceDir: z.string().min(1).default('./workspace'),
  pythonBin: z.string().min(1).default('python3'),
  timeoutMs: z.coerce.number().int().nonnegative().default(30_000), // 0 = unbounded
  killGraceMs: z.coerce.number().int().nonnegative().default(5_000),
  cleanup: z.enum(['remove', 'keep']).default('remove'),
  maxOutputChars: z.coerce.number().int().positive().default(1_000_000),
  truncationHead: z.coerce.number().int().nonnegative().default(400_000),
  truncationTail: z.coerce.number().int().nonnegative().default(400_000),
  maxBody: z.string().min(1).default('1mb'),
  logDir: z.string().min(1).default('~/.coderunner/logs'),
  execLogEnabled: booleanFromEnv.default('true'),
});

export type CodeRunnerConfig = z.infer<typeof configSchema>;
export type CleanupPolicy = CodeRunnerConfig['cleanup'];

// ── Helpers ──────────────────────────────────────────────────────────────────

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return p.replace('~', homedir());
  }
  return p;
}

// ── Singleton ────────────────────────────────────────────────────────────────

let cached: CodeRunnerConfig | null = null;

export function getConfig(): CodeRunnerConfig {
  if (cached) return cached;

  const raw = {
    host: process.env.CODERUNNER_HOST,
    port: process.env.CODERUNNER_PORT,
    workspaceDir: process.env.CODERUNNER_WORKSPACE_DIR,
    pythonBin: process.env.CODERUNNER_PYTHON_BIN,
    timeoutMs: process.env.CODERUNNER_TIMEOUT_MS,
    killGraceMs: process.env.CODERUNNER_KILL_GRACE_MS,
    cleanup: process.env.CODERUNNER_CLEANUP,
    maxOutputChars: process.env.CODERUNNER_MAX_OUTPUT_CHARS,
    truncationHead: process.env.CODERUNNER_TRUNCATION_HEAD,
    truncationTail: process.env.CODERUNNER_TRUNCATION_TAIL,
    maxBody: process.env.CODERUNNER_MAX_BODY,
    logDir: process.env.CODERUNNER_LOG_DIR,
    execLogEnabled: process.env.CODERUNNER_EXEC_LOG_ENABLED,
  };

  // Strip unset and empty keys so Zod defaults kick in
  const cleaned = Object.fromEntries(
    Object.entries(raw).filter(([, v]) => v !== undefined && v !== ''),
  );

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ConfigurationError(`CodeRunner config error: ${errors}`, {
      issues: result.error.errors.map((e) => e.path.join('.')),
    });
  }

  const config = result.data;
  if (config.truncationHead + config.truncationTail > config.maxOutputChars) {
    throw new ConfigurationError(
      'CodeRunner config error: truncationHead + truncationTail must not exceed maxOutputChars',
    );
  }

  config.workspaceDir = resolve(expandHome(config.workspaceDir));
  config.logDir = resolve(expandHome(config.logDir));

  cached = config;
  return config;
}

/** Reset cached config (for testing) */
export function resetConfig(): void {
  cached = null;
}

// ── Stripped Environment ─────────────────────────────────────────────────────

const ENV_ALLOWLIST = ['PATH', 'HOME', 'LANG', 'TERM', 'TMPDIR', 'USER'];

/**
 * Build the environment for executed code.
 * Only allowlisted vars pass through, so API keys and tokens of the host
 * process never reach submitted code. Python output is left unbuffered.
 */
export function getStrippedEnv(): Record<string, string> {
  const env: Record<string, string> = { PYTHONUNBUFFERED: '1' };
  for (const key of ENV_ALLOWLIST) {
    const val = process.env[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  return env;
}
