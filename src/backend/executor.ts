/**
 * Command Executor
 *
 * Spawns host tools (virsh, systemctl) and collects their output. The
 * backend adapter and the service probe depend only on the
 * CommandExecutor interface so tests can substitute a scripted fake.
 */

import { spawn } from 'node:child_process';

import { formatCommand, supportsAnsi } from './verbose.js';

/**
 * Error codes for command execution
 */
export type ExecutorErrorCode =
  | 'NOT_AVAILABLE'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'EXECUTION_FAILED';

/**
 * Error thrown when a command cannot be run or exits non-zero
 */
export class ExecutorError extends Error {
  constructor(
    message: string,
    public readonly code: ExecutorErrorCode,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly command: string
  ) {
    super(message);
    this.name = 'ExecutorError';
    Object.setPrototypeOf(this, ExecutorError.prototype);
  }
}

/**
 * Output of a successful command
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Options for executing a command
 */
export interface ExecuteOptions {
  /** Timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Kills the child when aborted */
  signal?: AbortSignal;
}

/**
 * Anything that can run a host command.
 */
export interface CommandExecutor {
  run(command: string, args: string[], options?: ExecuteOptions): Promise<CommandResult>;
}

/**
 * Options for constructing a ProcessExecutor
 */
export interface ProcessExecutorOptions {
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
}

/**
 * Strip ANSI escape codes and carriage returns.
 */
function stripAnsiCodes(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
}

/**
 * Pick the most informative line from a tool's stderr.
 *
 * virsh prefixes its messages with "error:"; the first such line is
 * usually the one that names the problem.
 */
export function formatErrorMessage(
  command: string,
  stderr: string,
  exitCode: number | null
): string {
  const lines = stripAnsiCodes(stderr)
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const errorLine = lines.find((line) => /^error:/i.test(line));
  if (errorLine) {
    const rest = lines.slice(lines.indexOf(errorLine) + 1, lines.indexOf(errorLine) + 2);
    return [errorLine.replace(/^error:\s*/i, ''), ...rest].join(' | ');
  }

  if (lines.length > 0) {
    return lines.slice(0, 3).join(' | ');
  }

  return `${command} exited with code ${exitCode}`;
}

/**
 * Executes commands as child processes.
 */
export class ProcessExecutor implements CommandExecutor {
  private readonly verbose: boolean;

  constructor(options?: ProcessExecutorOptions) {
    this.verbose = options?.verbose ?? false;
  }

  /**
   * Run a command and return its output.
   *
   * @throws ExecutorError if the command is missing, times out, is
   *   cancelled, or exits non-zero
   */
  async run(
    command: string,
    args: string[],
    options: ExecuteOptions = {}
  ): Promise<CommandResult> {
    const { timeout = 30000, signal } = options;
    const display = [command, ...args].join(' ');

    if (this.verbose) {
      process.stderr.write(formatCommand([command, ...args], supportsAnsi()));
    }

    if (signal?.aborted) {
      throw new ExecutorError(`${command} was cancelled`, 'CANCELLED', null, '', display);
    }

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (error: ExecutorError | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        signal?.removeEventListener('abort', onAbort);
        if (error) {
          reject(error);
        } else {
          resolve({ stdout, stderr });
        }
      };

      const onAbort = (): void => {
        child.kill('SIGTERM');
        finish(new ExecutorError(`${command} was cancelled`, 'CANCELLED', null, stderr, display));
      };

      const timeoutId = setTimeout(() => {
        child.kill('SIGTERM');
        finish(
          new ExecutorError(
            `${command} timed out after ${timeout}ms`,
            'TIMEOUT',
            null,
            stderr,
            display
          )
        );
      }, timeout);

      signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error: Error) => {
        finish(
          new ExecutorError(
            `Failed to spawn ${command}: ${error.message}`,
            'NOT_AVAILABLE',
            null,
            stderr,
            display
          )
        );
      });

      child.on('close', (code: number | null) => {
        if (code !== 0) {
          finish(
            new ExecutorError(
              formatErrorMessage(command, stderr, code),
              'EXECUTION_FAILED',
              code,
              stderr,
              display
            )
          );
          return;
        }
        finish(null);
      });
    });
  }
}
