/**
 * Utilities for executing system commands
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

/**
 * How a command invocation ended:
 * - `exited`: the process ran and exited (exit code may be non-zero)
 * - `timeout`: the process was killed after exceeding its timeout
 * - `failed`: the process could not be started or crashed on a signal
 */
export type ExecOutcome = 'exited' | 'timeout' | 'failed';

export interface ExecResult {
  outcome: ExecOutcome;
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ExecOptions {
  timeout?: number;
  cwd?: string;
}

interface ExecFailure extends Error {
  code?: string | number | null;
  killed?: boolean;
  signal?: string | null;
  stdout?: unknown;
  stderr?: unknown;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error;
}

function asText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function classifyFailure(error: unknown): ExecResult {
  if (!isExecFailure(error)) {
    return { outcome: 'failed', stdout: '', stderr: String(error), exitCode: 1 };
  }

  const stdout = asText(error.stdout);
  const stderr = asText(error.stderr) || error.message;

  if (typeof error.code === 'number') {
    return { outcome: 'exited', stdout, stderr, exitCode: error.code };
  }

  if (error.killed === true && error.code == null) {
    return { outcome: 'timeout', stdout, stderr, exitCode: 1 };
  }

  return { outcome: 'failed', stdout, stderr, exitCode: 1 };
}

/**
 * Run a binary with an argument vector (no shell) and classify the result.
 * Never rejects: launch failures and timeouts are reported in `outcome`.
 *
 * The result is `timeout` as soon as `timeout` ms pass, even when the child
 * survives SIGKILL (a process stuck in uninterruptible I/O) or holds its
 * pipes open. Whatever it prints or returns afterwards is discarded.
 */
export async function executeCommand(
  file: string,
  args: readonly string[] = [],
  options?: ExecOptions
): Promise<ExecResult> {
  const timeout = options?.timeout ?? 30000;
  const pending = execFileAsync(file, args, {
    timeout,
    killSignal: 'SIGKILL',
    cwd: options?.cwd,
    maxBuffer: 10 * 1024 * 1024, // 10MB
    encoding: 'utf8',
  });

  const finished = pending.then(
    ({ stdout, stderr }): ExecResult => ({
      outcome: 'exited',
      stdout: asText(stdout),
      stderr: asText(stderr),
      exitCode: 0,
    }),
    classifyFailure
  );

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<ExecResult>((resolve) => {
    timer = setTimeout(() => {
      pending.child?.kill('SIGKILL');
      resolve({ outcome: 'timeout', stdout: '', stderr: `Timed out after ${timeout}ms`, exitCode: 1 });
    }, timeout);
  });

  try {
    return await Promise.race([finished, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Check if a command exists in PATH
 */
export async function commandExists(command: string): Promise<boolean> {
  const result = await executeCommand('which', [command], { timeout: 5000 });
  return result.outcome === 'exited' && result.exitCode === 0;
}
