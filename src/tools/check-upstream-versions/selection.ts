/**
 * Choice of the upgrade target for one variant.
 *
 * Upgrades never cross a major version. When a variant file tracks several
 * minors of the same major (3.11 and 3.12, say) each entry also stays on its
 * minor, otherwise both would collapse onto the newest one.
 */

import { compareVersions, parseVersion, type ParsedVersion } from '@/lib/version-utils';

const LETTER = /[a-zA-Z]/;

/**
 * Regex that captures `{version}` from a tag template such as `{version}-slim`
 */
export function templatePattern(template: string): RegExp {
  const escaped = template.split('{version}').map((part) => part.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
  return new RegExp(`^${escaped.join('(.*)')}$`);
}

/**
 * Minor versions present per major version
 */
export function minorsByMajor(versions: readonly string[]): Map<number, Set<number>> {
  const tracks = new Map<number, Set<number>>();
  for (const version of versions) {
    const { major, minor } = parseVersion(version);
    const minors = tracks.get(major) ?? new Set<number>();
    minors.add(minor);
    tracks.set(major, minors);
  }
  return tracks;
}

export interface UpgradeOptions {
  strictMinor: boolean;
  tagTemplate?: string;
}

/**
 * Highest acceptable upstream version strictly above `current`, or undefined
 */
export function selectUpgrade(
  current: string,
  available: readonly string[],
  options: UpgradeOptions,
): string | undefined {
  const curr = parseVersion(current);
  const pattern = options.tagTemplate ? templatePattern(options.tagTemplate) : undefined;
  let best: ParsedVersion | undefined;

  for (const tag of available) {
    let candidate = tag;
    if (pattern) {
      const match = pattern.exec(tag);
      if (match?.[1] === undefined) continue;
      candidate = match[1];
    }

    // Letters mark pre-releases and flavours (rc1, beta, alpine)
    if (LETTER.test(candidate)) continue;

    const parsed = parseVersion(candidate);
    if (parsed.parts.length === 0) continue;
    if (compareVersions(parsed, curr) <= 0) continue;
    if (parsed.major !== curr.major) continue;
    if (options.strictMinor && parsed.minor !== curr.minor) continue;

    if (best === undefined || compareVersions(parsed, best) > 0) {
      best = parsed;
    }
  }

  return best?.raw;
}
