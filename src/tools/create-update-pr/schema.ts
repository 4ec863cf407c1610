/**
 * Schema definition for create-update-pr tool
 */

import { z } from 'zod';
import { filePath } from '../shared/schemas';

export const createUpdatePrSchema = z.object({
  reportFile: filePath.describe('Report written by check-pinned-deps or check-upstream-versions'),
});

export type CreateUpdatePrParams = z.infer<typeof createUpdatePrSchema>;
