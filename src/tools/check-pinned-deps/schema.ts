/**
 * Schema definition for check-pinned-deps tool
 */

import { z } from 'zod';
import { rootPath } from '../shared/schemas';

export const checkPinnedDepsSchema = z.object({
  root: rootPath,
});

export type CheckPinnedDepsParams = z.infer<typeof checkPinnedDepsSchema>;
