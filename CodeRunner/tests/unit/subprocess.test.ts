/**
 * Unit tests for runProcess, driven with the Node binary and `-e` snippets.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { join } from 'node:path';
import { runProcess, type RunProcessOptions } from '../../src/executor/subprocess.js';
import { truncationMarker } from '../../src/utils/output-truncate.js';
import { makeTempDir, removeDir, STAND_IN_INTERPRETER } from '../helpers/fixtures.js';

let cwd: string;
let options: RunProcessOptions;

beforeAll(async () => {
  cwd = await makeTempDir('subprocess');
  options = {
    cwd,
    env: { PATH: process.env.PATH ?? '' },
    timeoutMs: 0,
    killGraceMs: 200,
    capture: { maxChars: 100_000, head: 40_000, tail: 40_000 },
  };
});

afterAll(async () => {
  await removeDir(cwd);
});

function node(script: string, ...args: string[]): string[] {
  return [STAND_IN_INTERPRETER, '-e', script, ...args];
}

describe('runProcess', () => {
  it('should capture stdout, stderr and the exit code', async () => {
    const outcome = await runProcess(
      node("process.stdout.write('out'); process.stderr.write('err'); process.exit(2)"),
      options,
    );

    expect(outcome).toMatchObject({ kind: 'exited', exitCode: 2, stdout: 'out', stderr: 'err' });
  });

  it('should run in the given working directory', async () => {
    const outcome = await runProcess(node('console.log(process.cwd())'), options);
    expect(outcome).toMatchObject({ kind: 'exited', exitCode: 0, stdout: `${cwd}\n` });
  });

  it('should pass only the given environment', async () => {
    const outcome = await runProcess(
      node("console.log(Object.keys(process.env).filter((k) => k !== 'PATH').length)"),
      options,
    );
    expect(outcome).toMatchObject({ kind: 'exited', stdout: '0\n' });
  });

  it('should pass arguments verbatim without a shell', async () => {
    const outcome = await runProcess(
      node('console.log(process.argv[process.argv.length - 1])', '$(whoami); echo "hi" > pwned'),
      options,
    );
    expect(outcome).toMatchObject({ kind: 'exited', stdout: '$(whoami); echo "hi" > pwned\n' });
  });

  it('should give the child a closed stdin', async () => {
    const outcome = await runProcess(
      node("process.stdin.on('data', () => {}).on('end', () => console.log('eof'))"),
      { ...options, timeoutMs: 5_000 },
    );
    expect(outcome).toMatchObject({ kind: 'exited', exitCode: 0, stdout: 'eof\n' });
  });

  it('should report a signal death as a negative return code', async () => {
    const outcome = await runProcess(node("process.kill(process.pid, 'SIGKILL')"), options);
    expect(outcome).toMatchObject({ kind: 'exited', exitCode: -9 });
  });

  it('should resolve spawn failures instead of throwing', async () => {
    const outcome = await runProcess([join(cwd, 'no-such-interpreter'), 'x.py'], options);
    expect(outcome).toMatchObject({ kind: 'spawn_failed', errno: 'ENOENT' });
  });

  it('should refuse an empty argv', async () => {
    expect(await runProcess([], options)).toEqual({
      kind: 'spawn_failed',
      message: 'Empty command',
      durationMs: 0,
    });
  });

  it('should keep only the head and tail of output over the limit', async () => {
    const outcome = await runProcess(
      node("process.stdout.write('h'.repeat(100) + 'm'.repeat(200000) + 't'.repeat(100))"),
      { ...options, capture: { maxChars: 1_000, head: 100, tail: 100 } },
    );

    expect(outcome).toEqual({
      kind: 'exited',
      exitCode: 0,
      stdout: 'h'.repeat(100) + truncationMarker(200_000) + 't'.repeat(100),
      stderr: '',
      truncated: true,
      durationMs: expect.any(Number),
    });
  });

  it('should bound memory for a child that prints far past the limit', async () => {
    const outcome = await runProcess(
      node("const block = 'x'.repeat(1 << 20); for (let i = 0; i < 64; i++) process.stdout.write(block)"),
      { ...options, capture: { maxChars: 1_000, head: 100, tail: 100 } },
    );

    expect(outcome).toMatchObject({
      kind: 'exited',
      exitCode: 0,
      truncated: true,
      stdout: 'x'.repeat(100) + truncationMarker(64 * (1 << 20) - 200) + 'x'.repeat(100),
    });
  });

  it('should stop a child that runs past the timeout', async () => {
    const outcome = await runProcess(
      node("console.log('started'); setInterval(() => {}, 1000)"),
      { ...options, timeoutMs: 500 },
    );

    expect(outcome.kind).toBe('timed_out');
    expect(outcome.durationMs).toBeGreaterThanOrEqual(450);
    expect(outcome.durationMs).toBeLessThan(5_000);
  });

  it('should escalate to SIGKILL when SIGTERM is ignored', async () => {
    const outcome = await runProcess(
      node("process.on('SIGTERM', () => {}); setInterval(() => {}, 1000)"),
      { ...options, timeoutMs: 500, killGraceMs: 300 },
    );

    expect(outcome.kind).toBe('timed_out');
    expect(outcome.durationMs).toBeGreaterThanOrEqual(750);
  });
});
