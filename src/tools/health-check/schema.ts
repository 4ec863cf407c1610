/**
 * Schema definition for health-check tool
 */

import { z } from 'zod';

export const healthCheckSchema = z.object({});

export type HealthCheckParams = z.infer<typeof healthCheckSchema>;
