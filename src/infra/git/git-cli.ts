/**
 * Thin git CLI wrapper used by the update pull request flow.
 */

import type { Logger } from 'pino';

import { formatCommand, type CommandOutput, type CommandRunner } from '@/infra/exec/command-runner';
import { Failure, Success, type Result } from '@/types/core';

export interface GitClient {
  /** Run git and require exit code 0 */
  exec(args: string[]): Promise<Result<CommandOutput>>;
  configIdentity(name: string, email: string): Promise<Result<void>>;
  /** Fetch `base` and (re)create `branch` from `origin/<base>` */
  resetBranch(branch: string, base: string): Promise<Result<void>>;
  add(path: string): Promise<Result<void>>;
  /** True when the index differs from HEAD */
  hasStagedChanges(): Promise<Result<boolean>>;
  commit(message: string): Promise<Result<void>>;
  forcePush(branch: string): Promise<Result<void>>;
}

export function createGitClient(runner: CommandRunner, logger: Logger, cwd?: string): GitClient {
  const exec = async (args: string[]): Promise<Result<CommandOutput>> => {
    const result = await runner.run('git', args, cwd ? { cwd } : {});
    if (!result.ok) return result;
    if (result.value.exitCode !== 0) {
      const command = formatCommand('git', args);
      logger.error({ command, stderr: result.value.stderr.trim() }, 'Git command failed');
      return Failure(`Git command failed: ${command}\n${result.value.stderr.trim()}`);
    }
    return result;
  };

  const step = async (args: string[]): Promise<Result<void>> => {
    const result = await exec(args);
    return result.ok ? Success(undefined) : result;
  };

  return {
    exec,

    async configIdentity(name, email) {
      const named = await step(['config', 'user.name', name]);
      if (!named.ok) return named;
      return step(['config', 'user.email', email]);
    },

    async resetBranch(branch, base) {
      const fetched = await step(['fetch', 'origin', base]);
      if (!fetched.ok) return fetched;
      return step(['checkout', '-B', branch, `origin/${base}`]);
    },

    add(path) {
      return step(['add', path]);
    },

    async hasStagedChanges() {
      // Exit status 1 means "differences found", so this one is not run through exec
      const result = await runner.run('git', ['diff', '--cached', '--quiet'], cwd ? { cwd } : {});
      if (!result.ok) return result;
      if (result.value.exitCode > 1) {
        return Failure(`git diff failed: ${result.value.stderr.trim()}`);
      }
      return Success(result.value.exitCode === 1);
    },

    commit(message) {
      return step(['commit', '-m', message]);
    },

    forcePush(branch) {
      return step(['push', '--force', 'origin', branch]);
    },
  };
}
