/**
 * One-shot command execution for system utilities
 */

import { execFile, ExecFileException } from 'child_process';

/**
 * timeoutMs value that lets a command run as long as it needs
 */
export const NO_TIMEOUT = 0;

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Kill the command after this long; NO_TIMEOUT disables the limit */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

export interface CommandRunner {
  /**
   * Run a command to completion
   * Rejects on non-zero exit, spawn failure or timeout
   */
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

/**
 * Error carrying the output of a failed command
 */
export class CommandFailedError extends Error {
  constructor(
    message: string,
    public readonly stdout: string,
    public readonly stderr: string
  ) {
    super(message);
    this.name = 'CommandFailedError';
  }
}

/**
 * First line of the exec error, with the last stderr line when there is one
 */
function describeFailure(
  command: string,
  timeoutMs: number,
  error: ExecFileException,
  stderr: string
): string {
  if (error.killed && timeoutMs > 0) {
    return `${command} timed out after ${timeoutMs}ms`;
  }
  const headline = error.message.split('\n')[0];
  const lastLine = stderr.trim().split('\n').pop();
  return lastLine ? `${headline} (${lastLine})` : headline;
}

/**
 * Runs commands through execFile (no shell), killing them after the timeout
 */
export class ExecFileRunner implements CommandRunner {
  constructor(private readonly defaultTimeoutMs: number) {}

  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    return new Promise((resolve, reject) => {
      execFile(
        command,
        args,
        { timeout: timeoutMs, env: options.env ?? process.env, encoding: 'utf8' },
        (error, stdout, stderr) => {
          if (error) {
            reject(new CommandFailedError(describeFailure(command, timeoutMs, error, stderr), stdout, stderr));
            return;
          }
          resolve({ stdout, stderr });
        }
      );
    });
  }
}
