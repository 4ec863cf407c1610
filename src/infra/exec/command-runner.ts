/**
 * External command execution.
 *
 * Every CLI the factory drives (docker, trivy, cosign, crane, gh, git) is invoked
 * through this interface with an argument vector, never through a shell string.
 */

import { spawn } from 'node:child_process';
import { createReadStream } from 'node:fs';
import { access, constants } from 'node:fs/promises';
import { delimiter, join } from 'node:path';
import type { Logger } from 'pino';

import { Failure, Success, type Result } from '@/types/core';
import { errorCode, extractErrorMessage } from '@/lib/error-utils';
import { LIMITS } from '@/config/constants';

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  cwd?: string;
  /** Kill the process after this many milliseconds */
  timeout?: number;
  /** Text written to the child's stdin */
  input?: string;
  env?: NodeJS.ProcessEnv;
}

export interface StreamOptions {
  cwd?: string;
  /** File piped to the child's stdin */
  inputFile?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandRunner {
  /**
   * Run and capture output. A non-zero exit is a successful result carrying the
   * exit code; only a failure to start the process is a Failure.
   */
  run(command: string, args: string[], options?: RunOptions): Promise<Result<CommandOutput>>;

  /**
   * Run with stdout/stderr attached to the terminal and return the exit code.
   */
  stream(command: string, args: string[], options?: StreamOptions): Promise<Result<number>>;

  /** Equivalent of `command -v <name>` */
  isAvailable(command: string): Promise<boolean>;
}

/**
 * Render an argument vector for log output
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/[\s'"]/.test(part) ? JSON.stringify(part) : part)).join(' ');
}

function spawnFailure<T>(command: string, error: unknown): Result<T> {
  const notFound = errorCode(error) === 'ENOENT';
  return Failure(
    notFound ? `${command} not found in PATH` : `Failed to start ${command}: ${extractErrorMessage(error)}`,
    {
      message: notFound ? `${command} is not installed` : `Could not start ${command}`,
      hint: notFound ? `${command} must be installed and on PATH` : 'The process could not be spawned',
      resolution: notFound ? `Install ${command} or add it to PATH` : 'Check permissions and the PATH environment',
      details: { command, code: errorCode(error) },
    },
  );
}

export function createCommandRunner(logger: Logger): CommandRunner {
  return {
    run(command, args, options = {}) {
      logger.debug({ command: formatCommand(command, args), cwd: options.cwd }, 'Executing command');

      return new Promise((resolve) => {
        const child = spawn(command, args, {
          cwd: options.cwd,
          env: options.env ?? process.env,
          stdio: [options.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
        });

        let stdout = '';
        let stderr = '';
        let timedOut = false;
        let settled = false;

        const timer =
          options.timeout && options.timeout > 0
            ? setTimeout(() => {
                timedOut = true;
                child.kill('SIGTERM');
              }, options.timeout)
            : undefined;

        const append = (current: string, chunk: Buffer): string =>
          current.length >= LIMITS.MAX_OUTPUT_BUFFER ? current : current + chunk.toString('utf8');

        child.stdout?.on('data', (chunk: Buffer) => {
          stdout = append(stdout, chunk);
        });
        child.stderr?.on('data', (chunk: Buffer) => {
          stderr = append(stderr, chunk);
        });

        child.on('error', (error) => {
          if (timer) clearTimeout(timer);
          if (settled) return;
          settled = true;
          resolve(spawnFailure(command, error));
        });

        child.on('close', (code) => {
          if (timer) clearTimeout(timer);
          if (settled) return;
          settled = true;
          const exitCode = code ?? 1;
          logger.debug({ command, exitCode, timedOut }, 'Command finished');
          resolve(Success({ exitCode, stdout, stderr, timedOut }));
        });

        if (options.input !== undefined && child.stdin) {
          // The child may exit before reading everything
          child.stdin.on('error', (error) => logger.debug({ err: error, command }, 'stdin closed early'));
          child.stdin.end(options.input);
        }
      });
    },

    stream(command, args, options = {}) {
      logger.info({ command: formatCommand(command, args) }, 'Running');

      return new Promise((resolve) => {
        const child = spawn(command, args, {
          cwd: options.cwd,
          env: options.env ?? process.env,
          stdio: [options.inputFile ? 'pipe' : 'ignore', 'inherit', 'inherit'],
        });
        let settled = false;

        child.on('error', (error) => {
          if (settled) return;
          settled = true;
          resolve(spawnFailure(command, error));
        });

        child.on('close', (code) => {
          if (settled) return;
          settled = true;
          resolve(Success(code ?? 1));
        });

        if (options.inputFile && child.stdin) {
          child.stdin.on('error', (error) => logger.debug({ err: error, command }, 'stdin closed early'));
          const input = createReadStream(options.inputFile);
          input.on('error', (error) => {
            logger.error({ err: error, inputFile: options.inputFile }, 'Could not read stdin file');
            child.kill('SIGTERM');
          });
          input.pipe(child.stdin);
        }
      });
    },

    async isAvailable(command) {
      const searchPath = process.env.PATH ?? '';
      for (const dir of searchPath.split(delimiter).filter(Boolean)) {
        const executable = await access(join(dir, command), constants.X_OK).then(
          () => true,
          () => false,
        );
        if (executable) return true;
      }
      return false;
    },
  };
}
