/**
 * Mock child_process module for testing
 * Only the promisified execFile path used by src/utils/exec.ts is supported;
 * responses come from childProcessStub.
 */

import { promisify } from 'util';
import { childProcessStub, type StubbedCall } from '../__tests__/child-process-stub.js';

interface StubbedExecError extends Error {
  code?: string | number | null;
  killed?: boolean;
  signal?: string | null;
  stdout: string;
  stderr: string;
}

async function execFilePromise(
  file: string,
  args: readonly string[] = [],
  options: { timeout?: number } = {}
): Promise<{ stdout: string; stderr: string }> {
  const call: StubbedCall = { file, args, timeout: options.timeout };
  childProcessStub.calls.push(call);

  const response = childProcessStub.responder(call);
  if (response.hang) {
    return new Promise<never>(() => undefined);
  }

  const stdout = response.stdout ?? '';
  const stderr = response.stderr ?? '';

  if (response.error) {
    const error: StubbedExecError = Object.assign(
      new Error(response.error.message ?? `Command failed: ${file}`),
      {
        code: response.error.code,
        killed: response.error.killed,
        signal: response.error.signal,
        stdout,
        stderr,
      }
    );
    throw error;
  }

  return { stdout, stderr };
}

export function execFile(): never {
  throw new Error('Only the promisified execFile is available in tests');
}

Object.defineProperty(execFile, promisify.custom, { value: execFilePromise });
