/**
 * Schema definition for check-scan-results tool
 */

import { z } from 'zod';
import { filePath } from '../shared/schemas';

export const checkScanResultsSchema = z.object({
  resultsFile: filePath.describe('Trivy JSON report (trivy image --format json)'),
  ignoreFile: filePath.describe('Ignore list: advisory IDs, secret rule IDs or path globs'),
});

export type CheckScanResultsParams = z.infer<typeof checkScanResultsSchema>;
