/**
 * Helper Program Executor
 *
 * Spawns a short-lived helper program, collects its output and reports
 * the exit status. A non-zero status is not an error here; callers decide
 * what it means.
 */

import { spawn } from 'node:child_process';

import { formatCommand, supportsAnsi } from './verbose.js';

/**
 * Error codes for helper invocations
 */
export type CommandErrorCode = 'SPAWN_FAILED' | 'TIMED_OUT';

/**
 * Error thrown when a helper could not be run to completion
 */
export class CommandError extends Error {
  constructor(
    message: string,
    public readonly code: CommandErrorCode,
    public readonly program: string,
    public readonly stderr: string
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

/**
 * Outcome of a helper run
 */
export interface CommandResult {
  /** Exit status; null when the process was ended by a signal */
  status: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Options for running a helper
 */
export interface RunOptions {
  /** Timeout in milliseconds (default: 10000) */
  timeout?: number;
}

/**
 * Options for constructing a CommandExecutor
 */
export interface CommandExecutorOptions {
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
}

/**
 * Runs helper programs and captures their output.
 */
export class CommandExecutor {
  private readonly verbose: boolean;

  constructor(options?: CommandExecutorOptions) {
    this.verbose = options?.verbose ?? false;
  }

  /**
   * Run `program` with `args` and wait for it to exit.
   *
   * @throws CommandError if the program cannot be spawned or times out
   */
  async run(program: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const { timeout = 10000 } = options;

    if (this.verbose) {
      process.stderr.write(formatCommand(program, args, supportsAnsi()));
    }

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(program, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';
      let killed = false;

      const timeoutId = setTimeout(() => {
        killed = true;
        child.kill('SIGTERM');
        reject(
          new CommandError(
            `${program} timed out after ${timeout}ms`,
            'TIMED_OUT',
            program,
            stderr
          )
        );
      }, timeout);

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error: Error) => {
        clearTimeout(timeoutId);
        if (!killed) {
          killed = true;
          reject(
            new CommandError(
              `Failed to spawn ${program}: ${error.message}`,
              'SPAWN_FAILED',
              program,
              stderr
            )
          );
        }
      });

      child.on('close', (code: number | null) => {
        clearTimeout(timeoutId);
        if (killed) return;
        resolve({ status: code, stdout, stderr });
      });
    });
  }
}
