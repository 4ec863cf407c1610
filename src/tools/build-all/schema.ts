/**
 * Schema definition for build-all tool
 */

import { z } from 'zod';

export const buildAllSchema = z.object({
  failFast: z.boolean().default(false).describe('Stop at the first image that fails'),
});

export type BuildAllParams = z.infer<typeof buildAllSchema>;
