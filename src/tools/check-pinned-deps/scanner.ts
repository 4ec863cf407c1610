/**
 * Discovery of pinned and unpinned dependencies in Dockerfiles and GitHub
 * Actions workflows. Read-only: nothing here touches the network.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';

import { errorCode } from '@/lib/error-utils';
import { parseFromInstructions } from '@/lib/parsing/dockerfile';
import { parseImageReference } from '@/lib/parsing/image-reference';

export type DockerDependency =
  | { type: 'docker_digest'; file: string; image: string; tag: string; current_digest: string; raw_ref: string }
  | { type: 'docker_unpinned'; file: string; image: string; tag: string; current_digest: null; raw_ref: string };

export type ActionDependency =
  | { type: 'action_pinned'; file: string; action: string; tag: string; current_sha: string; raw_ref: string }
  | { type: 'action_no_tag'; file: string; action: string; current_sha: string; raw_ref: string }
  | { type: 'action_unpinned'; file: string; action: string; tag: string; current_sha: null; raw_ref: string };

const SKIPPED_DIRS = new Set(['.git', 'node_modules']);
const USES_PATTERN = /^\s*-?\s*uses:\s+([^@\s]+)@(\S+)/;
const TAG_COMMENT_PATTERN = /#\s*(v\S+)/;
const COMMIT_SHA_PATTERN = /^[0-9a-f]{40}$/;

async function walk(dir: string, accept: (name: string) => boolean, found: string[] = []): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!SKIPPED_DIRS.has(entry.name)) {
        await walk(path, accept, found);
      }
    } else if (entry.isFile() && accept(entry.name)) {
      found.push(path);
    }
  }
  return found;
}

function displayPath(root: string, file: string): string {
  return relative(root, file).split(sep).join('/');
}

/**
 * FROM references of one Dockerfile; `scratch` and earlier build stages are not dependencies
 */
export function dockerDependencies(content: string, file: string): DockerDependency[] {
  const stages = new Set<string>();
  const dependencies: DockerDependency[] = [];

  for (const from of parseFromInstructions(content)) {
    const resolved = from.resolved;
    const isStage = stages.has(resolved.toLowerCase());
    if (from.stage) stages.add(from.stage.toLowerCase());
    if (resolved === 'scratch' || isStage) continue;

    const { image, tag, digest } = parseImageReference(resolved);
    dependencies.push(
      digest
        ? { type: 'docker_digest', file, image, tag, current_digest: digest, raw_ref: from.raw }
        : { type: 'docker_unpinned', file, image, tag, current_digest: null, raw_ref: from.raw },
    );
  }
  return dependencies;
}

/**
 * `uses:` references of one workflow; local `./` actions are skipped
 */
export function actionDependencies(content: string, file: string): ActionDependency[] {
  const dependencies: ActionDependency[] = [];

  for (const line of content.split(/\r?\n/)) {
    const match = USES_PATTERN.exec(line);
    const action = match?.[1];
    const ref = match?.[2];
    if (!action || !ref || action.startsWith('./')) continue;

    const raw_ref = `${action}@${ref}`;
    if (COMMIT_SHA_PATTERN.test(ref)) {
      const tag = TAG_COMMENT_PATTERN.exec(line)?.[1];
      dependencies.push(
        tag
          ? { type: 'action_pinned', file, action, tag, current_sha: ref, raw_ref }
          : { type: 'action_no_tag', file, action, current_sha: ref, raw_ref },
      );
    } else {
      dependencies.push({ type: 'action_unpinned', file, action, tag: ref, current_sha: null, raw_ref });
    }
  }
  return dependencies;
}

export async function findDockerDependencies(root: string): Promise<DockerDependency[]> {
  const files = (await walk(root, (name) => name === 'Dockerfile')).sort();
  const dependencies: DockerDependency[] = [];
  for (const file of files) {
    dependencies.push(...dockerDependencies(await readFile(file, 'utf8'), displayPath(root, file)));
  }
  return dependencies;
}

export async function findActionDependencies(root: string): Promise<ActionDependency[]> {
  const githubDir = join(root, '.github');
  let files: string[];
  try {
    files = await walk(githubDir, (name) => name.endsWith('.yml') || name.endsWith('.yaml'));
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return [];
    throw error;
  }

  const dependencies: ActionDependency[] = [];
  for (const file of files.sort()) {
    dependencies.push(...actionDependencies(await readFile(file, 'utf8'), displayPath(root, file)));
  }
  return dependencies;
}
