/**
 * Schema definition for generate-matrix tool
 */

import { z } from 'zod';

export const generateMatrixSchema = z.object({
  level: z
    .union([z.literal(1), z.literal(2)])
    .optional()
    .describe('1: images built on public bases, 2: images built on internal images; all when omitted'),
});

export type GenerateMatrixParams = z.infer<typeof generateMatrixSchema>;
