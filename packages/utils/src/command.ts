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
  killGracePeriod?: number; // milliseconds between SIGTERM and SIGKILL
  signal?: AbortSignal;
}

/**
 * Signature shared by executeCommand and the fakes used in tests
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute an external command safely
 *
 * Resolves once the process exits, including on timeout (timedOut is set).
 * Rejects only when the process cannot be spawned at all (e.g. ENOENT).
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 60000,
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    killGracePeriod = 5000,
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

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | undefined;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), killGracePeriod);
    }, timeout);

    const onAbort = (): void => {
      child.kill('SIGTERM');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const cleanup = (): void => {
      clearTimeout(timeoutId);
      if (killTimer) {
        clearTimeout(killTimer);
      }
      signal?.removeEventListener('abort', onAbort);
    };

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdoutChunks.push(data);
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderrChunks.push(data);
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      cleanup();

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}

/**
 * Run `<command> <versionArgs>` and report whether it exited cleanly.
 * Never rejects: a missing binary is simply "not available".
 */
export async function checkCommandAvailable(
  command: string,
  versionArgs: string[] = ['-version'],
  options: { timeout?: number; runner?: CommandRunner } = {}
): Promise<boolean> {
  const { timeout = 5000, runner = executeCommand } = options;
  try {
    const result = await runner(command, versionArgs, { timeout, maxOutputSize: 64 * 1024 });
    return result.exitCode === 0 && !result.timedOut;
  } catch {
    return false;
  }
}
