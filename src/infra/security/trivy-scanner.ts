/**
 * Trivy Security Scanner
 *
 * Drives the Trivy CLI as the pre-flight vulnerability gate. Trivy decides
 * pass/fail itself through `--exit-code 1`, so the gate only interprets the
 * exit status; findings are printed by Trivy on the terminal.
 *
 * @see https://aquasecurity.github.io/trivy/
 */

import { existsSync } from 'node:fs';
import type { Logger } from 'pino';

import type { CommandRunner } from '@/infra/exec/command-runner';
import { Failure, Success, type Result } from '@/types/core';
import { DEFAULT_TIMEOUTS } from '@/config/constants';

export interface TrivyGateOptions {
  severities: string[];
  /** Passed as --ignorefile only when the file exists */
  ignoreFile?: string;
}

export interface TrivyGateResult {
  passed: boolean;
  trivyVersion?: string;
}

/**
 * Validate image reference against allowlist pattern before handing it to the CLI
 * Allows: alphanumeric, dots, colons, slashes, at-signs, underscores, and hyphens
 */
export function validateImageReference(reference: string): boolean {
  return /^[a-zA-Z0-9._:/@-]+$/.test(reference);
}

/**
 * Argument vector for the gating scan
 */
export function trivyGateArgs(imageRef: string, options: TrivyGateOptions, ignoreFileExists: boolean): string[] {
  const args = ['image', '--exit-code', '1', '--severity', options.severities.join(','), '--ignore-unfixed'];
  if (options.ignoreFile && ignoreFileExists) {
    args.push('--ignorefile', options.ignoreFile);
  }
  args.push(imageRef);
  return args;
}

/**
 * Trivy version, undefined when it cannot be parsed
 */
export async function getTrivyVersion(runner: CommandRunner, logger: Logger): Promise<Result<string | undefined>> {
  const result = await runner.run('trivy', ['--version'], { timeout: DEFAULT_TIMEOUTS.toolVersionCheck });
  if (!result.ok) return result;

  if (result.value.timedOut) {
    logger.error('Trivy version check timed out. The trivy process may be unresponsive or misconfigured.');
    return Success(undefined);
  }
  // Trivy version output format: "Version: X.Y.Z"
  const match = /Version:\s*(\S+)/.exec(result.value.stdout);
  if (!match) {
    logger.debug({ stdout: result.value.stdout }, 'Could not parse Trivy version from output');
  }
  return Success(match?.[1]);
}

export interface TrivyScanner {
  /** False when trivy is not on PATH; callers skip the scan with a warning */
  isAvailable(): Promise<boolean>;
  gate(imageRef: string, options: TrivyGateOptions): Promise<Result<TrivyGateResult>>;
}

export function createTrivyScanner(runner: CommandRunner, logger: Logger): TrivyScanner {
  return {
    isAvailable() {
      return runner.isAvailable('trivy');
    },

    async gate(imageRef, options) {
      if (!validateImageReference(imageRef)) {
        return Failure('Invalid image reference format', {
          message: 'Image reference contains invalid characters',
          hint: 'Only alphanumeric characters, dots, colons, slashes, at-signs, underscores, and hyphens are allowed',
          details: { imageRef },
        });
      }

      const version = await getTrivyVersion(runner, logger);
      const trivyVersion = version.ok ? version.value : undefined;

      const ignoreFileExists = options.ignoreFile !== undefined && existsSync(options.ignoreFile);
      logger.info(
        { trivyVersion, imageRef, severities: options.severities, ignoreFile: ignoreFileExists ? options.ignoreFile : undefined },
        'Running Trivy',
      );

      const scan = await runner.stream('trivy', trivyGateArgs(imageRef, options, ignoreFileExists));
      if (!scan.ok) return scan;

      const result: TrivyGateResult = { passed: scan.value === 0 };
      if (trivyVersion) result.trivyVersion = trivyVersion;
      return Success(result);
    },
  };
}
