/**
 * Health Check Module
 * Availability checks for the Docker daemon and the external CLIs the factory drives
 */

import type { Logger } from 'pino';

import type { DockerClient } from '@/infra/docker/client';
import type { CommandRunner } from '@/infra/exec/command-runner';
import { DEFAULT_TIMEOUTS } from '@/config/constants';
import { extractErrorMessage } from './error-utils';

/**
 * Status of an individual dependency
 */
export interface DependencyStatus {
  available: boolean;
  version?: string;
  error?: string;
}

/**
 * Check Docker daemon health and connectivity
 *
 * @returns Docker availability status with version or error details
 */
export async function checkDockerHealth(
  docker: DockerClient,
  logger: Logger,
  options: { timeout?: number } = {},
): Promise<DependencyStatus> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUTS.daemonHealthCheck;
  let timer: NodeJS.Timeout | undefined;

  try {
    const versionInfo = await Promise.race([
      docker.version(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('Docker connection timeout')), timeout);
      }),
    ]);

    if (!versionInfo.ok) {
      return { available: false, error: versionInfo.error };
    }
    return { available: true, version: versionInfo.value.version };
  } catch (error) {
    logger.debug({ error }, 'Docker health check failed');
    return { available: false, error: extractErrorMessage(error) };
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Check an external CLI by running its version command; the first output line is the version
 */
export async function checkCommandHealth(
  runner: CommandRunner,
  command: string,
  versionArgs: string[],
): Promise<DependencyStatus> {
  const result = await runner.run(command, versionArgs, { timeout: DEFAULT_TIMEOUTS.toolVersionCheck });
  if (!result.ok) {
    return { available: false, error: result.error };
  }
  if (result.value.exitCode !== 0) {
    return { available: false, error: result.value.stderr.trim() || `exit code ${result.value.exitCode}` };
  }

  const firstLine = (result.value.stdout || result.value.stderr).trim().split('\n')[0];
  return firstLine ? { available: true, version: firstLine } : { available: true };
}
