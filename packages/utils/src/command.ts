/**
 * Command Execution
 *
 * Runs a short-lived external command to completion and captures its
 * output. Long-running encodes do not go through here; they need their
 * streams while the process runs.
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  /** Milliseconds before the command is killed */
  timeout?: number;
  signal?: AbortSignal;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Rejects only when the command cannot be started at all
 */
export function executeCommand(
  command: string,
  args: readonly string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const { timeout = DEFAULT_TIMEOUT_MS, signal } = options;
  const startTime = Date.now();

  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
      signal,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeout);

    child.once('error', (error) => {
      clearTimeout(timer);
      if (child.pid === undefined) reject(error);
    });

    child.once('close', (code, exitSignal) => {
      clearTimeout(timer);
      resolve({
        exitCode: code,
        signal: exitSignal,
        stdout: Buffer.concat(stdout).toString(),
        stderr: Buffer.concat(stderr).toString(),
        duration: Date.now() - startTime,
        timedOut,
      });
    });
  });
}
