/**
 * Command Execution Wrapper
 *
 * Scoped wrapper for executing external commands with:
 * - Timeout handling
 * - Cancellation through AbortSignal
 * - Output capture (with live stdout streaming)
 * - Escalation from SIGTERM to SIGKILL
 *
 * The returned promise settles only after the child has exited, so a caller
 * that awaits it never leaves a process behind.
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
  aborted: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds, no limit when omitted
  maxOutputSize?: number; // characters kept per stream (latest output wins)
  killGraceMs?: number; // SIGTERM → SIGKILL delay
  signal?: AbortSignal;
  onStdout?: (chunk: string) => void;
}

/**
 * Raised when the binary cannot be started at all (missing, not executable).
 */
export class CommandSpawnError extends Error {
  public readonly command: string;
  public readonly code: string | undefined;

  constructor(command: string, cause: NodeJS.ErrnoException) {
    super(`Failed to start ${command}: ${cause.message}`);
    this.name = 'CommandSpawnError';
    this.command = command;
    this.code = cause.code;
    this.cause = cause;
  }
}

/**
 * Execute an external command
 *
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 * @returns Promise resolving to CommandResult once the process has exited
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout,
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    killGraceMs = 5000,
    signal,
    onStdout,
  } = options;

  const startTime = Date.now();

  if (signal?.aborted) {
    return {
      exitCode: -1,
      signal: null,
      stdout: '',
      stderr: '',
      duration: 0,
      timedOut: false,
      aborted: true,
    };
  }

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let aborted = false;
    let forceKillTimer: NodeJS.Timeout | undefined;

    const terminate = (): void => {
      if (child.exitCode !== null || child.signalCode !== null) return;
      child.kill('SIGTERM');
      forceKillTimer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill('SIGKILL');
        }
      }, killGraceMs);
    };

    const timeoutId = timeout !== undefined
      ? setTimeout(() => {
        timedOut = true;
        terminate();
      }, timeout)
      : undefined;

    const onAbort = (): void => {
      aborted = true;
      terminate();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const release = (): void => {
      if (timeoutId) clearTimeout(timeoutId);
      if (forceKillTimer) clearTimeout(forceKillTimer);
      signal?.removeEventListener('abort', onAbort);
    };

    // Decode on the stream so multi-byte characters survive chunk boundaries
    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');

    // Capture stdout, keeping the most recent maxOutputSize characters
    child.stdout?.on('data', (chunk: string) => {
      onStdout?.(chunk);
      stdout = keepTail(stdout + chunk, maxOutputSize);
    });

    // Capture stderr the same way; failures are diagnosed from its tail
    child.stderr?.on('data', (chunk: string) => {
      stderr = keepTail(stderr + chunk, maxOutputSize);
    });

    child.on('close', (code, exitSignal) => {
      release();

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        signal: exitSignal,
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
        aborted,
      });
    });

    // Spawn errors (ENOENT, EACCES) never produce a 'close' with output
    child.on('error', (error: NodeJS.ErrnoException) => {
      release();
      reject(new CommandSpawnError(command, error));
    });
  });
}

function keepTail(output: string, limit: number): string {
  return output.length > limit ? output.slice(output.length - limit) : output;
}

/**
 * Last `lines` non-empty lines of a process output
 */
export function tailLines(output: string, lines: number = 20): string {
  return output
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .slice(-lines)
    .join('\n');
}
