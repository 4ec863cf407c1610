/**
 * Gate a Trivy JSON report against the repository ignore list and report
 * ignores that no longer match anything.
 */

import { readFile } from 'node:fs/promises';

import {
  evaluateScanReport,
  loadIgnoreFile,
  renderScanEvaluation,
  TrivyReportSchema,
  type ScanEvaluation,
} from '@/infra/security/scan-report';
import { extractErrorMessage } from '@/lib/error-utils';
import { setupToolContext } from '@/lib/tool-helpers';
import type { ToolContext } from '@/types/context';
import { Failure, Success, type Result } from '@/types/core';
import { tool } from '@/types/tool';
import { type CheckScanResultsParams, checkScanResultsSchema } from './schema';

export interface CheckScanResultsResult {
  /** False when unignored findings remain */
  passed: boolean;
  ignoresLoaded: number;
  evaluation: ScanEvaluation;
  /** Report lines in print order */
  lines: string[];
}

async function handleCheckScanResults(
  params: CheckScanResultsParams,
  context: ToolContext,
): Promise<Result<CheckScanResultsResult>> {
  const { logger, timer } = setupToolContext(context, 'check-scan-results');

  let ignores: string[];
  try {
    ignores = await loadIgnoreFile(params.ignoreFile);
  } catch (error) {
    return Failure(`Could not read ${params.ignoreFile}: ${extractErrorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(params.resultsFile, 'utf8'));
  } catch (error) {
    timer.error(error);
    return Failure(`Error reading scan results: ${extractErrorMessage(error)}`, {
      message: 'Scan results are not readable JSON',
      resolution: 'Produce the report with `trivy image --format json --output <file>`.',
      details: { resultsFile: params.resultsFile },
    });
  }

  const report = TrivyReportSchema.safeParse(raw);
  if (!report.success) {
    timer.error(report.error);
    return Failure(`Error reading scan results: unexpected report shape in ${params.resultsFile}`);
  }

  const evaluation = evaluateScanReport(report.data, ignores);
  const lines = [`Loaded ${ignores.length} ignores from ${params.ignoreFile}`, ...renderScanEvaluation(evaluation)];
  const passed = evaluation.findings.length === 0;

  logger.debug({ findings: evaluation.findings.length, stale: evaluation.staleIgnores.length }, 'Scan evaluated');
  timer.end({ passed });
  return Success({ passed, ignoresLoaded: ignores.length, evaluation, lines });
}

export const checkScanResults = handleCheckScanResults;

export default tool({
  name: 'check-scan-results',
  description: 'Fail on Trivy findings that are not in the ignore list and list stale ignores',
  category: 'security',
  schema: checkScanResultsSchema,
  handler: handleCheckScanResults,
});
