/**
 * Check pinned Docker digests and GitHub Action SHAs for newer upstream values.
 *
 * Lookups go through crane and the gh CLI. A lookup that fails becomes a
 * warning, never an error: one unreachable registry must not hide the other
 * updates in the report.
 */

import { resolve } from 'node:path';

import { actionRepository, createGitHubClient } from '@/infra/github/gh-cli';
import { createCraneClient } from '@/infra/registry/crane';
import { extractErrorMessage } from '@/lib/error-utils';
import { setupToolContext } from '@/lib/tool-helpers';
import type { ToolContext } from '@/types/context';
import { Failure, Success, type Result } from '@/types/core';
import { tool } from '@/types/tool';
import type { DependencyReport } from '../shared/dependency-report';
import {
  findActionDependencies,
  findDockerDependencies,
  type ActionDependency,
  type DockerDependency,
} from './scanner';
import { type CheckPinnedDepsParams, checkPinnedDepsSchema } from './schema';

export interface CheckPinnedDepsResult {
  root: string;
  report: DependencyReport;
}

async function handleCheckPinnedDeps(
  params: CheckPinnedDepsParams,
  context: ToolContext,
): Promise<Result<CheckPinnedDepsResult>> {
  const { logger, timer } = setupToolContext(context, 'check-pinned-deps');
  const root = resolve(context.config.workspaceDir, params.root ?? '.');
  logger.info(`Scanning ${root} ...`);

  let dockerDeps: DockerDependency[];
  let actionDeps: ActionDependency[];
  try {
    dockerDeps = await findDockerDependencies(root);
    actionDeps = await findActionDependencies(root);
  } catch (error) {
    timer.error(error);
    return Failure(`Could not scan ${root}: ${extractErrorMessage(error)}`);
  }

  const crane = createCraneClient(context.runner, logger);
  const github = createGitHubClient(context.runner, logger);
  const report: DependencyReport = { updates: [], warnings: [], up_to_date: [] };

  for (const dep of dockerDeps) {
    const reference = `${dep.image}:${dep.tag}`;
    logger.info(`Checking ${reference} ...`);
    const latest = await crane.digest(reference);

    if (!latest.ok) {
      report.warnings.push({
        file: dep.file,
        image: dep.image,
        tag: dep.tag,
        reason: `Could not check update for ${reference}`,
        type: dep.type,
      });
      continue;
    }

    if (dep.type === 'docker_unpinned') {
      // Any resolvable digest is an update: the reference gets pinned
      report.updates.push({ ...dep, latest_digest: latest.value });
    } else if (latest.value !== dep.current_digest) {
      report.updates.push({ ...dep, latest_digest: latest.value });
    } else {
      report.up_to_date.push({
        file: dep.file,
        image: dep.image,
        tag: dep.tag,
        digest: dep.current_digest,
        type: dep.type,
        raw_ref: dep.raw_ref,
      });
    }
  }

  for (const dep of actionDeps) {
    if (dep.type === 'action_no_tag') {
      report.warnings.push({
        file: dep.file,
        action: dep.action,
        current_sha: dep.current_sha,
        reason: 'SHA-pinned action without tag comment',
        type: dep.type,
      });
      continue;
    }

    logger.info(`Checking ${dep.action}@${dep.tag} ...`);
    const latest = await github.resolveCommit(actionRepository(dep.action), dep.tag);

    if (!latest.ok) {
      report.warnings.push({
        file: dep.file,
        action: dep.action,
        ref: dep.tag,
        reason: `Could not check update for ${dep.action}@${dep.tag}`,
        type: dep.type,
      });
      continue;
    }

    if (dep.type === 'action_unpinned') {
      report.updates.push({ ...dep, latest_sha: latest.value });
    } else if (latest.value !== dep.current_sha) {
      report.updates.push({ ...dep, latest_sha: latest.value });
    } else {
      report.up_to_date.push({
        file: dep.file,
        action: dep.action,
        tag: dep.tag,
        sha: dep.current_sha,
        type: dep.type,
        raw_ref: dep.raw_ref,
      });
    }
  }

  timer.end({
    updates: report.updates.length,
    warnings: report.warnings.length,
    upToDate: report.up_to_date.length,
  });
  return Success({ root, report });
}

/**
 * One-line summary printed after the JSON report
 */
export function summarizeReport(report: DependencyReport): string {
  return `Summary: ${report.updates.length} update(s), ${report.warnings.length} warning(s), ${report.up_to_date.length} up-to-date`;
}

export const checkPinnedDeps = handleCheckPinnedDeps;

export default tool({
  name: 'check-pinned-deps',
  description: 'Report Docker digest and GitHub Action SHA pins that have newer upstream values',
  category: 'maintenance',
  schema: checkPinnedDepsSchema,
  handler: handleCheckPinnedDeps,
});
