import { describe, it, expect, vi } from 'vitest';
import { commandTask, execFileNoThrow, TaskCommandError } from '../../../src/utils/exec.js';

describe('execFileNoThrow', () => {
  it('returns status 0 and stdout on success', async () => {
    const result = await execFileNoThrow('/bin/echo', ['hello world']);
    expect(result.status).toBe(0);
    expect(result.stdout.trim()).toBe('hello world');
    expect(result.stderr).toBe('');
  });

  it('never throws on command not found', async () => {
    const result = await execFileNoThrow('/bin/this-command-does-not-exist-cronstamp', []);
    expect(result.status).toBe(1);
    expect(result.stderr).toContain('ENOENT');
  });

  it('returns the exit code of a failing command', async () => {
    const result = await execFileNoThrow('/bin/sh', ['-c', 'echo broken >&2; exit 3']);
    expect(result.status).toBe(3);
    expect(result.stderr.trim()).toBe('broken');
  });

  it('reports 124 when the timeout kills the command', async () => {
    const result = await execFileNoThrow('/bin/sleep', ['10'], { timeoutMs: 100 });
    expect(result.status).toBe(124);
  });

  it('passes environment variables', async () => {
    const result = await execFileNoThrow('/usr/bin/env', [], {
      env: { ...process.env, CRONSTAMP_TEST_VAR: 'stamp_value' },
    });
    expect(result.status).toBe(0);
    expect(result.stdout).toContain('CRONSTAMP_TEST_VAR=stamp_value');
  });

  it('uses working directory option', async () => {
    const result = await execFileNoThrow('/bin/pwd', [], { cwd: '/tmp' });
    expect(result.status).toBe(0);
    expect(result.stdout.trim()).toMatch(/\/tmp$/);
  });
});

describe('commandTask', () => {
  it('resolves when the command succeeds and hands over its output', async () => {
    const onOutput = vi.fn();
    const task = commandTask('/bin/echo', ['cleaned'], { onOutput });

    await expect(task()).resolves.toBeUndefined();
    expect(onOutput).toHaveBeenCalledWith({ stdout: 'cleaned\n', stderr: '', status: 0 });
  });

  it('throws TaskCommandError with the exit status on failure', async () => {
    const task = commandTask('/bin/sh', ['-c', 'echo nope >&2; exit 2']);

    await expect(task()).rejects.toMatchObject({
      name: 'TaskCommandError',
      message: 'Command failed with status 2: /bin/sh -c echo nope >&2; exit 2',
      command: '/bin/sh -c echo nope >&2; exit 2',
      status: 2,
      stderr: 'nope\n',
    });
  });

  it('still hands over output when the command fails', async () => {
    const onOutput = vi.fn();
    const task = commandTask('/bin/sh', ['-c', 'echo partial; exit 1'], { onOutput });

    await expect(task()).rejects.toBeInstanceOf(TaskCommandError);
    expect(onOutput).toHaveBeenCalledWith(expect.objectContaining({ stdout: 'partial\n', status: 1 }));
  });
});
