/**
 * Subprocess helpers for command tasks.
 *
 * execFileNoThrow never throws: it resolves with { stdout, stderr, status }.
 * No shell expansion (execFile, not exec).
 */
import { execFile } from 'node:child_process';
import { type Task } from '../types/index.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  status: number;
}

export interface ExecOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** 0 disables the timeout. */
  timeoutMs?: number;
  maxBuffer?: number;
}

const DEFAULT_MAX_BUFFER = 10 * 1024 * 1024; // 10 MB

export class TaskCommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly status: number,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = 'TaskCommandError';
  }
}

/**
 * Execute a file with arguments. Never throws.
 *
 * @param file - Absolute path or binary name (resolved via PATH)
 * @param args - Arguments array (no shell interpolation)
 * @returns status 0 = success, 124 = killed by timeout, N = error code
 */
export function execFileNoThrow(file: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
  const { cwd, env, timeoutMs = 0, maxBuffer = DEFAULT_MAX_BUFFER } = options;

  return new Promise<ExecResult>((resolve) => {
    execFile(
      file,
      args,
      { cwd, env, timeout: timeoutMs, maxBuffer, windowsHide: true, encoding: 'utf8' },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, status: 0 });
          return;
        }

        const code: unknown = error.code;
        const status = typeof code === 'number' ? code : error.killed ? 124 : 1;
        resolve({ stdout, stderr: stderr || error.message, status });
      },
    );
  });
}

/**
 * Wrap a command as a Task. The task throws TaskCommandError on a
 * non-zero exit; `onOutput` receives the captured output either way.
 */
export function commandTask(
  file: string,
  args: string[],
  options: ExecOptions & { onOutput?: (result: ExecResult) => void } = {},
): Task {
  const { onOutput, ...execOptions } = options;
  const command = [file, ...args].join(' ');

  return async () => {
    const result = await execFileNoThrow(file, args, execOptions);
    onOutput?.(result);
    if (result.status !== 0) {
      throw new TaskCommandError(`Command failed with status ${result.status}: ${command}`, command, result.status, result.stderr);
    }
  };
}
