/**
 * Version ordering helpers for image variants and upstream releases.
 *
 * Two orderings exist on purpose:
 * - `compareVariantOrder` picks the variant that receives the `latest` tag and
 *   orders by the first three dot-separated fields numerically.
 * - `parseVersion`/`compareVersions` compare every run of digits, used when
 *   looking for upstream updates.
 */

/**
 * Leading integer of a field, 0 when the field does not start with a digit
 */
function leadingNumber(field: string): number {
  const match = /^\s*(\d+)/.exec(field);
  return match?.[1] ? Number.parseInt(match[1], 10) : 0;
}

/**
 * Order variants by major, minor and patch fields numerically; equal keys fall
 * back to plain string comparison of the whole version.
 */
export function compareVariantOrder(a: string, b: string): number {
  const fieldsA = a.split('.');
  const fieldsB = b.split('.');

  for (let k = 0; k < 3; k++) {
    const diff = leadingNumber(fieldsA[k] ?? '') - leadingNumber(fieldsB[k] ?? '');
    if (diff !== 0) return diff;
  }

  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Highest variant under `compareVariantOrder`, undefined for an empty list
 */
export function selectLatestVersion(versions: readonly string[]): string | undefined {
  let latest: string | undefined;
  for (const version of versions) {
    if (latest === undefined || compareVariantOrder(version, latest) >= 0) {
      latest = version;
    }
  }
  return latest;
}

export interface ParsedVersion {
  raw: string;
  parts: number[];
  major: number;
  minor: number;
  micro: number;
}

/**
 * Every digit run in the string becomes a numeric component: `v3.12.1` → [3, 12, 1]
 */
export function parseVersion(raw: string): ParsedVersion {
  const parts = (raw.match(/\d+/g) ?? []).map((p) => Number.parseInt(p, 10));
  return {
    raw,
    parts,
    major: parts[0] ?? 0,
    minor: parts[1] ?? 0,
    micro: parts[2] ?? 0,
  };
}

/**
 * Element-wise comparison; when one list is a prefix of the other the shorter one is smaller
 */
export function compareVersions(a: ParsedVersion, b: ParsedVersion): number {
  const length = Math.min(a.parts.length, b.parts.length);
  for (let i = 0; i < length; i++) {
    const diff = (a.parts[i] ?? 0) - (b.parts[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return a.parts.length - b.parts.length;
}
