/**
 * Keyless image signing with cosign. In CI the OIDC identity of the workflow is
 * used, so no key material passes through here.
 */

import type { Logger } from 'pino';

import type { CommandRunner } from '@/infra/exec/command-runner';
import { Failure, Success, type Result } from '@/types/core';

export interface CosignSigner {
  isAvailable(): Promise<boolean>;
  sign(reference: string): Promise<Result<void>>;
}

export function createCosignSigner(runner: CommandRunner, logger: Logger): CosignSigner {
  return {
    isAvailable() {
      return runner.isAvailable('cosign');
    },

    async sign(reference) {
      logger.info({ reference }, 'Signing image with cosign');
      const result = await runner.stream('cosign', ['sign', '--yes', reference]);
      if (!result.ok) return result;
      if (result.value !== 0) {
        return Failure(`cosign sign failed for ${reference} (exit code ${result.value})`, {
          message: `Signing ${reference} failed`,
          hint: 'Keyless signing needs an OIDC identity (id-token: write in GitHub Actions)',
          resolution: 'Check the cosign output above and the workflow permissions.',
        });
      }
      return Success(undefined);
    },
  };
}
