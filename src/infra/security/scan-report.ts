/**
 * Evaluation of a Trivy JSON report against an ignore file.
 *
 * Trivy's own `--ignorefile` silently hides entries; this evaluation also
 * reports ignores that no longer match anything so the list can be pruned.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';

import { errorCode } from '@/lib/error-utils';
import { fnmatch } from '@/lib/fnmatch';
import { ADVISORY_ID_PREFIXES } from '@/config/constants';

// Trivy JSON output structures (only the fields the gate reads)
const TrivyVulnerabilitySchema = z
  .object({
    VulnerabilityID: z.string().nullish(),
    PkgName: z.string().nullish(),
    Title: z.string().nullish(),
  })
  .passthrough();

const TrivySecretSchema = z
  .object({
    RuleID: z.string().nullish(),
    Title: z.string().nullish(),
  })
  .passthrough();

const TrivyResultSchema = z
  .object({
    Target: z.string().nullish(),
    Vulnerabilities: z.array(TrivyVulnerabilitySchema).nullish(),
    Secrets: z.array(TrivySecretSchema).nullish(),
  })
  .passthrough();

export const TrivyReportSchema = z
  .object({
    Results: z.array(TrivyResultSchema).nullish(),
  })
  .passthrough();

export type TrivyReport = z.infer<typeof TrivyReportSchema>;

export interface ScanEvaluation {
  /** True when the report holds no results at all */
  empty: boolean;
  findings: string[];
  /** Ignore entries that matched nothing, sorted */
  staleIgnores: string[];
}

/**
 * Parse ignore file content: `#` starts a comment anywhere on the line,
 * blank lines are skipped, duplicates collapse while keeping file order.
 */
export function parseIgnoreList(content: string): string[] {
  const ignores = new Set<string>();
  for (const rawLine of content.split(/\r?\n/)) {
    const hashAt = rawLine.indexOf('#');
    const line = (hashAt === -1 ? rawLine : rawLine.slice(0, hashAt)).trim();
    if (line) {
      ignores.add(line);
    }
  }
  return [...ignores];
}

/**
 * Load an ignore file; a missing file means no ignores
 */
export async function loadIgnoreFile(path: string): Promise<string[]> {
  try {
    return parseIgnoreList(await readFile(path, 'utf8'));
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

function isAdvisoryId(pattern: string): boolean {
  return ADVISORY_ID_PREFIXES.some((prefix) => pattern.startsWith(prefix));
}

export function evaluateScanReport(report: TrivyReport, ignoreList: readonly string[]): ScanEvaluation {
  const ignores = new Set(ignoreList);
  const used = new Set<string>();
  const findings: string[] = [];
  const results = report.Results ?? [];

  for (const result of results) {
    const target = result.Target ?? 'unknown';

    for (const vuln of result.Vulnerabilities ?? []) {
      const vulnId = vuln.VulnerabilityID;
      if (!vulnId) continue;

      if (ignores.has(vulnId)) {
        used.add(vulnId);
      } else {
        findings.push(`[VULN] ${vulnId} (${vuln.PkgName ?? 'unknown'}): ${vuln.Title ?? 'No title'}`);
      }
    }

    for (const secret of result.Secrets ?? []) {
      const ruleId = secret.RuleID;
      let ignored = false;

      if (ruleId && ignores.has(ruleId)) {
        used.add(ruleId);
        ignored = true;
      }

      if (!ignored) {
        // Non-advisory entries double as path globs for secret findings
        const pattern = ignoreList.find(
          (candidate) =>
            !isAdvisoryId(candidate) && (fnmatch(target, candidate) || fnmatch(basename(target), candidate)),
        );
        if (pattern !== undefined) {
          used.add(pattern);
          ignored = true;
        }
      }

      if (!ignored) {
        findings.push(`[SECRET] ${ruleId ?? 'None'} in ${target}: ${secret.Title ?? 'No title'}`);
      }
    }
  }

  const staleIgnores = [...ignores].filter((entry) => !used.has(entry)).sort();

  return { empty: results.length === 0, findings, staleIgnores };
}

/**
 * Human-readable report lines, in the order the gate prints them
 */
export function renderScanEvaluation(evaluation: ScanEvaluation): string[] {
  const lines: string[] = [];
  if (evaluation.empty) {
    lines.push('No results found in scan (scan passed clean).');
  }

  if (evaluation.findings.length > 0) {
    lines.push('', '[FAILURE] Unignored High/Critical findings detected:');
    lines.push(...evaluation.findings.map((finding) => `  ${finding}`));
  } else {
    lines.push('', '[SUCCESS] No unignored vulnerabilities found.');
  }

  if (evaluation.staleIgnores.length > 0) {
    lines.push('', '[STALE IGNORES] The following ignores are no longer detected and can be removed:');
    lines.push(...evaluation.staleIgnores.map((entry) => `  - ${entry}`));
  }
  return lines;
}
