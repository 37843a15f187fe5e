/**
 * Command Execution Wrapper
 * 
 * Safe wrapper for executing external commands with:
 * - Timeout handling
 * - Output capture
 * - Error handling
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

/**
 * Anything that can run an external command the way executeCommand does.
 * Components take one of these so tests can hand in a fake.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute an external command safely
 * 
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 * @returns Promise resolving to CommandResult
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | undefined;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      // Force kill after 10 seconds
      killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
      killTimer.unref();
    }, timeout);

    const onAbort = (): void => {
      child.kill('SIGTERM');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    // Spawn failures (binary missing, bad cwd)
    child.on('error', (error) => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });
  });
}
