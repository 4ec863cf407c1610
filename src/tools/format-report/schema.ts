/**
 * Schema definition for format-report tool
 */

import { z } from 'zod';
import { filePath } from '../shared/schemas';

export const ReportKindSchema = z.enum(['updates', 'warnings', 'success']);

export const formatReportSchema = z.object({
  reportFile: filePath,
  type: ReportKindSchema.describe('Which part of the report to render'),
});

export type ReportKind = z.infer<typeof ReportKindSchema>;
export type FormatReportParams = z.infer<typeof formatReportSchema>;
