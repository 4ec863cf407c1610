/**
 * Look for newer upstream releases of the versions listed in variant files.
 *
 * Each configured variant file follows one upstream: GitHub releases (through
 * the gh CLI) or a registry repository's tags (through crane). The output uses
 * the dependency report format so the same pull request flow applies it.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import yaml from 'js-yaml';
import type { Logger } from 'pino';

import { parseVariants } from '@/catalog/image-catalog';
import { createGitHubClient } from '@/infra/github/gh-cli';
import { createCraneClient } from '@/infra/registry/crane';
import { extractErrorMessage } from '@/lib/error-utils';
import { setupToolContext } from '@/lib/tool-helpers';
import { parseVersion } from '@/lib/version-utils';
import type { ToolContext } from '@/types/context';
import { Failure, Success, type Result } from '@/types/core';
import { tool } from '@/types/tool';
import type { DependencyUpdate } from '../shared/dependency-report';
import {
  type CheckUpstreamVersionsParams,
  checkUpstreamVersionsSchema,
  UpstreamConfigSchema,
  type UpstreamConfig,
  type UpstreamSource,
} from './schema';
import { minorsByMajor, selectUpgrade } from './selection';

export interface CheckUpstreamVersionsResult {
  updates: DependencyUpdate[];
}

export async function loadUpstreamConfig(path: string): Promise<Result<UpstreamConfig | undefined>> {
  if (!existsSync(path)) return Success(undefined);

  let raw: unknown;
  try {
    // YAML is a superset of JSON, so one loader covers both formats
    raw = yaml.load(await readFile(path, 'utf8'));
  } catch (error) {
    return Failure(`Could not parse ${path}: ${extractErrorMessage(error)}`);
  }

  const parsed = UpstreamConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    return Failure(`Invalid upstream config ${path}`, {
      message: 'Upstream config does not match the expected shape',
      hint: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      resolution: 'Each entry needs source github_release (with repo) or docker_hub (with image).',
    });
  }
  return Success(parsed.data);
}

async function upstreamVersions(source: UpstreamSource, context: ToolContext, logger: Logger): Promise<string[]> {
  if (source.source === 'github_release') {
    const tags = await createGitHubClient(context.runner, logger).releaseTags(source.repo);
    if (!tags.ok) return [];
    // Tags without the prefix are not release versions
    return tags.value.filter((tag) => tag.startsWith(source.prefix)).map((tag) => tag.slice(source.prefix.length));
  }

  const tags = await createCraneClient(context.runner, logger).listTags(source.image);
  return tags.ok ? tags.value : [];
}

async function handleCheckUpstreamVersions(
  params: CheckUpstreamVersionsParams,
  context: ToolContext,
): Promise<Result<CheckUpstreamVersionsResult>> {
  const { logger, timer } = setupToolContext(context, 'check-upstream-versions');
  const workspace = context.config.workspaceDir;

  const config = await loadUpstreamConfig(resolve(workspace, params.config));
  if (!config.ok) return config;
  if (config.value === undefined) {
    logger.info({ config: params.config }, 'No upstream config, nothing to check');
    return Success({ updates: [] });
  }

  const updates: DependencyUpdate[] = [];

  for (const [file, source] of Object.entries(config.value)) {
    const path = resolve(workspace, file);
    if (!existsSync(path)) continue;

    const current = parseVariants(await readFile(path, 'utf8'));
    if (current.length === 0) continue;
    logger.info(`Checking ${file} (${current.length} versions)...`);

    const available = await upstreamVersions(source, context, logger);
    if (available.length === 0) {
      logger.info('No upstream versions found.');
      continue;
    }
    logger.info(`Found ${available.length} upstream tags.`);

    const tracks = minorsByMajor(current);
    for (const version of current) {
      const strictMinor = (tracks.get(parseVersion(version).major)?.size ?? 0) > 1;
      let latest = selectUpgrade(version, available, {
        strictMinor,
        ...(source.tag_template !== undefined && { tagTemplate: source.tag_template }),
      });

      if (latest === undefined || latest === version) {
        logger.info(`${version} is up-to-date`);
        continue;
      }
      if (version.startsWith('v') && !latest.startsWith('v')) {
        latest = `v${latest}`;
      }

      logger.info(`Found update: ${version} -> ${latest}`);
      updates.push({
        file,
        current_version: version,
        latest_version: latest,
        type: 'variant_update',
        raw_ref: version,
      });
    }
  }

  timer.end({ updates: updates.length });
  return Success({ updates });
}

export const checkUpstreamVersions = handleCheckUpstreamVersions;

export default tool({
  name: 'check-upstream-versions',
  description: 'Find newer upstream releases for the versions in variant files',
  category: 'maintenance',
  schema: checkUpstreamVersionsSchema,
  handler: handleCheckUpstreamVersions,
});
