/**
 * GitHub access through the `gh` CLI, which carries its own authentication
 * (GH_TOKEN in CI).
 */

import type { Logger } from 'pino';
import { z } from 'zod';

import type { CommandRunner } from '@/infra/exec/command-runner';
import { Failure, Success, type Result } from '@/types/core';
import { DEFAULT_TIMEOUTS } from '@/config/constants';

const CommitSchema = z.object({ sha: z.string().min(1) }).passthrough();

export interface CreatePullRequestOptions {
  title: string;
  body: string;
  head: string;
  base: string;
}

export interface GitHubClient {
  /** Commit SHA a ref (branch, tag or SHA) of `owner/repo` resolves to */
  resolveCommit(ownerRepo: string, ref: string): Promise<Result<string>>;
  /** Tags of published, non-draft, non-prerelease releases, newest first */
  releaseTags(repo: string, limit?: number): Promise<Result<string[]>>;
  /** Number of the open pull request for a head branch, if any */
  findOpenPullRequest(head: string): Promise<Result<string | undefined>>;
  /** URL of the created pull request */
  createPullRequest(options: CreatePullRequestOptions): Promise<Result<string>>;
}

/**
 * `owner/repo/sub/path` actions live in `owner/repo`
 */
export function actionRepository(action: string): string {
  return action.split('/').slice(0, 2).join('/');
}

/**
 * Tag column of `gh release list` output (title, type, tag, date; tab separated)
 */
export function parseReleaseList(output: string): string[] {
  const tags: string[] = [];
  for (const line of output.split('\n')) {
    const tag = line.split('\t')[2];
    if (tag) tags.push(tag);
  }
  return tags;
}

export function createGitHubClient(runner: CommandRunner, logger: Logger): GitHubClient {
  return {
    async resolveCommit(ownerRepo, ref) {
      const result = await runner.run(
        'gh',
        ['api', `repos/${ownerRepo}/commits/${ref}`, '--header', 'Accept: application/vnd.github+json'],
        { timeout: DEFAULT_TIMEOUTS.registryLookup },
      );
      if (!result.ok) return result;
      if (result.value.timedOut) {
        return Failure(`gh api timed out for ${ownerRepo}@${ref}`);
      }
      if (result.value.exitCode !== 0) {
        logger.warn({ ownerRepo, ref, stderr: result.value.stderr.trim() }, 'gh api failed');
        return Failure(`gh api failed for ${ownerRepo}@${ref}: ${result.value.stderr.trim()}`);
      }

      let body: unknown;
      try {
        body = JSON.parse(result.value.stdout);
      } catch {
        return Failure(`gh api returned invalid JSON for ${ownerRepo}@${ref}`);
      }
      const parsed = CommitSchema.safeParse(body);
      if (!parsed.success) {
        return Failure(`No commit SHA in gh api response for ${ownerRepo}@${ref}`);
      }
      return Success(parsed.data.sha);
    },

    async releaseTags(repo, limit = 30) {
      const result = await runner.run('gh', [
        'release',
        'list',
        '-R',
        repo,
        '--limit',
        String(limit),
        '--exclude-drafts',
        '--exclude-pre-releases',
      ]);
      if (!result.ok) return result;
      if (result.value.exitCode !== 0) {
        return Failure(`gh release list failed for ${repo}: ${result.value.stderr.trim()}`);
      }
      return Success(parseReleaseList(result.value.stdout));
    },

    async findOpenPullRequest(head) {
      const result = await runner.run('gh', [
        'pr',
        'list',
        '--head',
        head,
        '--state',
        'open',
        '--json',
        'number',
        '-q',
        '.[0].number',
      ]);
      if (!result.ok) return result;
      if (result.value.exitCode !== 0) {
        return Failure(`gh pr list failed: ${result.value.stderr.trim()}`);
      }
      const number = result.value.stdout.trim();
      return Success(number || undefined);
    },

    async createPullRequest({ title, body, head, base }) {
      const result = await runner.run('gh', [
        'pr',
        'create',
        '--title',
        title,
        '--body',
        body,
        '--head',
        head,
        '--base',
        base,
      ]);
      if (!result.ok) return result;
      if (result.value.exitCode !== 0) {
        return Failure(`Failed to create PR: ${result.value.stderr.trim()}`, {
          message: 'Pull request creation failed',
          hint: 'gh needs a token with pull-request write access',
          resolution: 'Set GH_TOKEN and check the repository permissions.',
        });
      }
      return Success(result.value.stdout.trim());
    },
  };
}
