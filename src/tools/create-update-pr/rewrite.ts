/**
 * Text rewrites applied to one file, and the pull request body describing them.
 */

import { shortDigest, shortSha, type DependencyUpdate } from '../shared/dependency-report';

function replaceAll(content: string, search: string, replacement: string): string {
  return search ? content.split(search).join(replacement) : content;
}

/**
 * Replace whitespace-separated tokens equal to `search`; whitespace is kept as written
 */
function replaceToken(content: string, search: string, replacement: string): string {
  return content
    .split(/(\s+)/)
    .map((token) => (token === search ? replacement : token))
    .join('');
}

/**
 * Apply every update once per distinct (type, raw_ref); all occurrences are replaced,
 * variant versions only as whole tokens
 */
export function applyUpdates(content: string, updates: readonly DependencyUpdate[]): string {
  const seen = new Set<string>();
  let result = content;

  for (const update of updates) {
    const key = `${update.type}\u0000${update.raw_ref}`;
    if (seen.has(key)) continue;
    seen.add(key);

    switch (update.type) {
      case 'docker_digest':
        result = replaceAll(result, update.current_digest, update.latest_digest);
        break;
      case 'docker_unpinned':
        result = replaceAll(result, update.raw_ref, `${update.raw_ref}@${update.latest_digest}`);
        break;
      case 'action_pinned':
        result = replaceAll(result, update.current_sha, update.latest_sha);
        break;
      case 'action_unpinned':
        result = replaceAll(result, update.raw_ref, `${update.action}@${update.latest_sha} # ${update.tag}`);
        break;
      case 'variant_update':
        result = replaceToken(result, update.current_version, update.latest_version);
        break;
    }
  }
  return result;
}

function describeUpdate(update: DependencyUpdate): string[] {
  switch (update.type) {
    case 'docker_digest':
      return [
        `- **${update.image}:${update.tag}** in \`${update.file}\``,
        `  - \`${shortDigest(update.current_digest)}...\` -> \`${shortDigest(update.latest_digest)}...\``,
      ];
    case 'docker_unpinned':
      return [
        `- **${update.image}:${update.tag}** in \`${update.file}\` (Pinned)`,
        `  - \`unpinned\` -> \`${shortDigest(update.latest_digest)}...\``,
      ];
    case 'action_pinned':
      return [
        `- **${update.action}@${update.tag}** in \`${update.file}\``,
        `  - \`${shortSha(update.current_sha)}\` -> \`${shortSha(update.latest_sha)}\``,
      ];
    case 'action_unpinned':
      return [
        `- **${update.action}@${update.tag}** in \`${update.file}\` (Pinned)`,
        `  - \`unpinned\` -> \`${shortSha(update.latest_sha)}\``,
      ];
    case 'variant_update':
      return [
        `- **${update.file}** (Version Update)`,
        `  - \`${update.current_version}\` -> \`${update.latest_version}\``,
      ];
  }
}

export function pullRequestBody(updates: readonly DependencyUpdate[]): string {
  return [
    '## Summary',
    '',
    'Automated update of pinned dependency digests and/or SHAs detected by the nightly dependency checker.',
    '',
    '### Updated dependencies',
    '',
    ...updates.flatMap(describeUpdate),
    '',
    '## Test plan',
    '',
    '- [ ] Verify updated digests/SHAs resolve correctly',
    '- [ ] Confirm nightly build passes with updated dependencies',
    '',
    'Generated by the nightly pinned dependency checker',
  ].join('\n');
}
