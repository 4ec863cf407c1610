/**
 * Render a dependency report as Discord embed fields for the nightly summary.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { extractErrorMessage } from '@/lib/error-utils';
import { setupToolContext } from '@/lib/tool-helpers';
import type { ToolContext } from '@/types/context';
import { Failure, Success, type Result } from '@/types/core';
import { tool } from '@/types/tool';
import {
  DependencyReportSchema,
  shortDigest,
  shortSha,
  type DependencyReport,
  type DependencyUpdate,
} from '../shared/dependency-report';
import { type FormatReportParams, formatReportSchema, type ReportKind } from './schema';

export interface EmbedField {
  name: string;
  value: string;
  inline: false;
}

function updateField(update: DependencyUpdate): EmbedField {
  const field = (name: string, value: string): EmbedField => ({ name, value, inline: false });

  switch (update.type) {
    case 'docker_digest':
      return field(
        `${update.image}:${update.tag}`,
        `File: \`${update.file}\`\nOld: \`${shortDigest(update.current_digest)}...\`\nNew: \`${shortDigest(update.latest_digest)}...\``,
      );
    case 'action_pinned':
      return field(
        `${update.action}@${update.tag}`,
        `File: \`${update.file}\`\nOld: \`${shortSha(update.current_sha)}\`\nNew: \`${shortSha(update.latest_sha)}\``,
      );
    case 'docker_unpinned':
      return field(
        `${update.image}:${update.tag}`,
        `File: \`${update.file}\`\nStatus: Pinned to \`${shortDigest(update.latest_digest)}...\``,
      );
    case 'action_unpinned':
      return field(
        `${update.action}@${update.tag}`,
        `File: \`${update.file}\`\nStatus: Pinned to \`${shortSha(update.latest_sha)}\``,
      );
    case 'variant_update':
      return field(update.file, `Version: \`${update.current_version}\` -> \`${update.latest_version}\``);
  }
}

export function formatReportFields(report: DependencyReport, kind: ReportKind): EmbedField[] {
  switch (kind) {
    case 'updates':
      return report.updates.map(updateField);
    case 'warnings':
      return report.warnings.map((warning) => ({
        name: warning.action ?? warning.image ?? 'unknown',
        value: `File: \`${warning.file}\`\n${warning.reason}`,
        inline: false,
      }));
    case 'success':
      return [
        {
          name: 'Status',
          value: `${report.up_to_date.length} dependencies checked. All up to date.`,
          inline: false,
        },
      ];
  }
}

async function handleFormatReport(params: FormatReportParams, context: ToolContext): Promise<Result<EmbedField[]>> {
  const { timer } = setupToolContext(context, 'format-report');

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(resolve(context.config.workspaceDir, params.reportFile), 'utf8'));
  } catch (error) {
    return Failure(`Could not read report ${params.reportFile}: ${extractErrorMessage(error)}`);
  }

  const report = DependencyReportSchema.safeParse(raw);
  if (!report.success) {
    return Failure(`Report ${params.reportFile} is not a dependency report`);
  }

  const fields = formatReportFields(report.data, params.type);
  timer.end({ type: params.type, fields: fields.length });
  return Success(fields);
}

export const formatReport = handleFormatReport;

export default tool({
  name: 'format-report',
  description: 'Render a dependency report as Discord embed fields',
  category: 'reporting',
  schema: formatReportSchema,
  handler: handleFormatReport,
});
