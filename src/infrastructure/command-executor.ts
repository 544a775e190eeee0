/**
 * Command Executor - runs external commands (docker, deploy scripts)
 * without a shell, with timeout and output limits
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import type { Logger } from 'pino';
import { CommandError, ErrorCodes } from '../lib/errors';

export type OutputStream = 'stdout' | 'stderr';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Milliseconds before the child is terminated; 0 disables the timeout */
  timeout?: number;
  maxBuffer?: number;
  /** Receives output as it arrives */
  onOutput?: (chunk: string, stream: OutputStream) => void;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

export class CommandExecutor {
  constructor(private readonly logger: Logger) {}

  /**
   * Execute a command with arguments and collect its output
   */
  async execute(
    command: string,
    args: string[] = [],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const {
      cwd = process.cwd(),
      env = process.env,
      timeout = 30000,
      maxBuffer = 10 * 1024 * 1024, // 10MB
      onOutput,
    } = options;

    this.logger.debug({ command, args, cwd }, 'Executing command');

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      let timeoutHandle: NodeJS.Timeout | undefined;

      const spawnOptions: SpawnOptions = {
        cwd,
        env,
        shell: false,
      };

      const child = spawn(command, args, spawnOptions);

      const fail = (error: Error): void => {
        if (settled) return;
        settled = true;
        if (timeoutHandle) clearTimeout(timeoutHandle);
        reject(error);
      };

      if (timeout > 0) {
        timeoutHandle = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          setTimeout(() => {
            if (child.exitCode === null) {
              child.kill('SIGKILL');
            }
          }, 5000).unref();
        }, timeout);
      }

      child.stdout?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        onOutput?.(chunk, 'stdout');
        if (stdout.length + chunk.length <= maxBuffer) {
          stdout += chunk;
        } else {
          child.kill('SIGTERM');
          fail(new Error(`Command output exceeded maximum buffer size of ${maxBuffer} bytes`));
        }
      });

      child.stderr?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        onOutput?.(chunk, 'stderr');
        if (stderr.length + chunk.length <= maxBuffer) {
          stderr += chunk;
        }
      });

      child.on('close', (code: number | null) => {
        if (settled) return;
        settled = true;
        if (timeoutHandle) clearTimeout(timeoutHandle);

        const exitCode = code ?? -1;
        this.logger.debug({ command, exitCode, timedOut }, 'Command completed');

        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode,
          timedOut,
        });
      });

      child.on('error', (error: Error) => {
        this.logger.error({ command, error: error.message }, 'Command execution failed');
        fail(error);
      });
    });
  }

  /**
   * Execute and throw CommandError unless the command exits 0
   */
  async run(command: string, args: string[] = [], options: CommandOptions = {}): Promise<CommandResult> {
    const result = await this.execute(command, args, options);
    const display = [command, ...args].join(' ');

    if (result.timedOut) {
      throw new CommandError(
        `Command timed out: ${display}`,
        display,
        result.exitCode,
        result.stderr,
        ErrorCodes.COMMAND_TIMEOUT,
      );
    }
    if (result.exitCode !== 0) {
      const reason = result.stderr ? `: ${result.stderr.split('\n')[0] ?? ''}` : '';
      throw new CommandError(
        `Command exited with code ${result.exitCode}: ${display}${reason}`,
        display,
        result.exitCode,
        result.stderr,
      );
    }
    return result;
  }

  /**
   * Check if a command is available on PATH
   */
  async isAvailable(command: string): Promise<boolean> {
    try {
      const result = await this.execute('which', [command], { timeout: 5000 });
      return result.exitCode === 0 && result.stdout.length > 0;
    } catch (error) {
      this.logger.debug({ command, error }, 'Availability check failed');
      return false;
    }
  }
}
