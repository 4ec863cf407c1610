/**
 * crane CLI wrapper for remote registry lookups that need no local daemon.
 */

import type { Logger } from 'pino';

import type { CommandRunner } from '@/infra/exec/command-runner';
import { Failure, Success, type Result } from '@/types/core';
import { DEFAULT_TIMEOUTS } from '@/config/constants';

export interface CraneClient {
  /** Current manifest digest of `<image>:<tag>` */
  digest(reference: string): Promise<Result<string>>;
  /** Every tag of a repository, one per line of `crane ls` */
  listTags(repository: string): Promise<Result<string[]>>;
}

export function createCraneClient(runner: CommandRunner, logger: Logger): CraneClient {
  const lookup = async (args: string[], subject: string): Promise<Result<string>> => {
    const result = await runner.run('crane', args, { timeout: DEFAULT_TIMEOUTS.registryLookup });
    if (!result.ok) return result;

    const { exitCode, stdout, stderr, timedOut } = result.value;
    if (timedOut) {
      logger.warn({ subject }, 'crane lookup timed out');
      return Failure(`crane ${args[0] ?? ''} timed out for ${subject}`);
    }
    if (exitCode !== 0) {
      logger.warn({ subject, stderr: stderr.trim() }, 'crane lookup failed');
      return Failure(`crane ${args[0] ?? ''} failed for ${subject}: ${stderr.trim()}`);
    }
    return Success(stdout.trim());
  };

  return {
    digest(reference) {
      return lookup(['digest', reference], reference);
    },

    async listTags(repository) {
      const result = await lookup(['ls', repository], repository);
      if (!result.ok) return result;
      return Success(
        result.value
          .split('\n')
          .map((line) => line.trim())
          .filter(Boolean),
      );
    },
  };
}
