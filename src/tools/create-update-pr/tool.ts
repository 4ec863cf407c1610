/**
 * Apply a dependency report to the working tree and open (or refresh) the
 * update pull request.
 *
 * The branch is recreated from origin/main on every run and force-pushed, so a
 * persistent runner never carries stale edits and an already open pull request
 * simply picks up the new commit.
 */

import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { UPDATE_PR } from '@/config/constants';
import { createGitHubClient } from '@/infra/github/gh-cli';
import { createGitClient } from '@/infra/git/git-cli';
import { extractErrorMessage } from '@/lib/error-utils';
import { setupToolContext } from '@/lib/tool-helpers';
import type { ToolContext } from '@/types/context';
import { Failure, Success, type Result } from '@/types/core';
import { tool } from '@/types/tool';
import { DependencyReportSchema, type DependencyUpdate } from '../shared/dependency-report';
import { applyUpdates, pullRequestBody } from './rewrite';
import { type CreateUpdatePrParams, createUpdatePrSchema } from './schema';

export type CreateUpdatePrOutcome =
  | { status: 'no-updates' }
  | { status: 'no-changes'; skippedFiles: string[] }
  | { status: 'pr-created'; url: string; skippedFiles: string[] }
  | { status: 'pr-exists'; number: string; skippedFiles: string[] };

export function groupByFile(updates: readonly DependencyUpdate[]): Map<string, DependencyUpdate[]> {
  const groups = new Map<string, DependencyUpdate[]>();
  for (const update of updates) {
    const group = groups.get(update.file) ?? [];
    group.push(update);
    groups.set(update.file, group);
  }
  return groups;
}

async function handleCreateUpdatePr(
  params: CreateUpdatePrParams,
  context: ToolContext,
): Promise<Result<CreateUpdatePrOutcome>> {
  const { logger, timer } = setupToolContext(context, 'create-update-pr');
  const workspace = context.config.workspaceDir;

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(resolve(workspace, params.reportFile), 'utf8'));
  } catch (error) {
    return Failure(`Could not read report ${params.reportFile}: ${extractErrorMessage(error)}`);
  }
  const report = DependencyReportSchema.safeParse(raw);
  if (!report.success) {
    return Failure(`Report ${params.reportFile} is not a dependency report`, {
      message: 'Unexpected report shape',
      hint: report.error.issues[0]?.message ?? 'Validation failed',
    });
  }

  const updates = report.data.updates;
  if (updates.length === 0) {
    logger.info('No updates to apply');
    return Success({ status: 'no-updates' });
  }

  const git = createGitClient(context.runner, logger, workspace);
  const identity = await git.configIdentity(UPDATE_PR.authorName, UPDATE_PR.authorEmail);
  if (!identity.ok) return identity;

  logger.info(`Resetting branch ${UPDATE_PR.branch} to origin/${UPDATE_PR.base}...`);
  const reset = await git.resetBranch(UPDATE_PR.branch, UPDATE_PR.base);
  if (!reset.ok) return reset;

  logger.info('Applying updates to local files...');
  const skippedFiles: string[] = [];
  for (const [file, fileUpdates] of groupByFile(updates)) {
    const path = resolve(workspace, file);
    if (!existsSync(path)) {
      logger.warn(`Warning: File ${file} not found, skipping.`);
      skippedFiles.push(file);
      continue;
    }
    await writeFile(path, applyUpdates(await readFile(path, 'utf8'), fileUpdates), 'utf8');
    const staged = await git.add(file);
    if (!staged.ok) return staged;
  }

  const changed = await git.hasStagedChanges();
  if (!changed.ok) return changed;
  if (!changed.value) {
    logger.info('No changes to commit.');
    timer.end({ status: 'no-changes' });
    return Success({ status: 'no-changes', skippedFiles });
  }

  logger.info('Committing changes...');
  const committed = await git.commit(UPDATE_PR.commitMessage);
  if (!committed.ok) return committed;

  logger.info(`Pushing branch ${UPDATE_PR.branch}...`);
  const pushed = await git.forcePush(UPDATE_PR.branch);
  if (!pushed.ok) return pushed;

  const github = createGitHubClient(context.runner, logger);
  const existing = await github.findOpenPullRequest(UPDATE_PR.branch);
  if (!existing.ok) return existing;
  if (existing.value !== undefined) {
    logger.info(`PR #${existing.value} already exists.`);
    timer.end({ status: 'pr-exists' });
    return Success({ status: 'pr-exists', number: existing.value, skippedFiles });
  }

  logger.info('Creating Pull Request...');
  const created = await github.createPullRequest({
    title: UPDATE_PR.commitMessage,
    body: pullRequestBody(updates),
    head: UPDATE_PR.branch,
    base: UPDATE_PR.base,
  });
  if (!created.ok) {
    timer.error(created.error);
    return created;
  }

  logger.info(`Created PR: ${created.value}`);
  timer.end({ status: 'pr-created' });
  return Success({ status: 'pr-created', url: created.value, skippedFiles });
}

export const createUpdatePr = handleCreateUpdatePr;

export default tool({
  name: 'create-update-pr',
  description: 'Apply a dependency report and open the update pull request',
  category: 'maintenance',
  schema: createUpdatePrSchema,
  handler: handleCreateUpdatePr,
});
