import { describe, expect, it } from 'vitest';
import { executeCommand } from '../src/command.js';

describe('executeCommand', () => {
  it('captures stdout, stderr and the exit code', async () => {
    const result = await executeCommand(process.execPath, [
      '-e',
      'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)',
    ]);

    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe('out');
    expect(result.stderr).toBe('err');
    expect(result.timedOut).toBe(false);
  });

  it('runs in the requested working directory', async () => {
    const result = await executeCommand(process.execPath, ['-e', 'process.stdout.write(process.cwd())'], {
      cwd: process.cwd(),
    });

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe(process.cwd());
  });

  it('kills commands that run past the timeout', async () => {
    const result = await executeCommand(process.execPath, ['-e', 'setTimeout(() => {}, 5000)'], {
      timeout: 100,
    });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).not.toBe(0);
  });

  it('rejects when the binary cannot be spawned', async () => {
    await expect(executeCommand('relpack-no-such-binary', [])).rejects.toThrow(/ENOENT/);
  });
});
