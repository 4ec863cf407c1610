/**
 * Report which external dependencies are usable on this machine.
 *
 * The daemon and buildx are required for any build; the other tools are
 * optional and their absence only disables a step (scan, signing, lookups).
 */

import { checkCommandHealth, checkDockerHealth, type DependencyStatus } from '@/lib/health-checks';
import { setupToolContext } from '@/lib/tool-helpers';
import type { ToolContext } from '@/types/context';
import { Success, type Result } from '@/types/core';
import { tool } from '@/types/tool';
import { type HealthCheckParams, healthCheckSchema } from './schema';

export interface DependencyReportEntry extends DependencyStatus {
  name: string;
  required: boolean;
}

export interface HealthCheckResult {
  healthy: boolean;
  dependencies: DependencyReportEntry[];
}

const COMMAND_CHECKS: ReadonlyArray<{ name: string; command: string; args: string[]; required: boolean }> = [
  { name: 'buildx', command: 'docker', args: ['buildx', 'version'], required: true },
  { name: 'trivy', command: 'trivy', args: ['--version'], required: false },
  { name: 'cosign', command: 'cosign', args: ['version'], required: false },
  { name: 'crane', command: 'crane', args: ['version'], required: false },
  { name: 'gh', command: 'gh', args: ['--version'], required: false },
  { name: 'git', command: 'git', args: ['--version'], required: false },
];

async function handleHealthCheck(_params: HealthCheckParams, context: ToolContext): Promise<Result<HealthCheckResult>> {
  const { logger, timer } = setupToolContext(context, 'health-check');

  const dependencies: DependencyReportEntry[] = [
    { name: 'docker', required: true, ...(await checkDockerHealth(context.docker(), logger)) },
  ];
  for (const check of COMMAND_CHECKS) {
    const status = await checkCommandHealth(context.runner, check.command, check.args);
    dependencies.push({ name: check.name, required: check.required, ...status });
  }

  const healthy = dependencies.every((dependency) => dependency.available || !dependency.required);
  timer.end({ healthy });
  return Success({ healthy, dependencies });
}

export const healthCheck = handleHealthCheck;

export default tool({
  name: 'health-check',
  description: 'Check the Docker daemon, buildx and the optional CLIs',
  category: 'utility',
  schema: healthCheckSchema,
  handler: handleHealthCheck,
});
