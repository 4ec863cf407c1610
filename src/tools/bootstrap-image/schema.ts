/**
 * Schema definition for bootstrap-image tool
 */

import { z } from 'zod';
import { imageName, imageTag, platform } from '../shared/schemas';

export const bootstrapImageSchema = z.object({
  name: imageName.describe('Image name under the bootstrap/ path of the registry'),
  context: z.string().min(1).default('.').describe('Build context directory'),
  tag: imageTag.default('latest'),
  builder: z.string().min(1).optional().describe('buildx builder name (defaults to the configured builder)'),
  endpoint: z.string().min(1).optional().describe('Remote builder endpoint, e.g. ssh://builder@buildhost'),
  platform: platform.default('linux/amd64'),
  caCert: z.string().min(1).optional().describe('Registry CA certificate to trust before pushing'),
});

export type BootstrapImageParams = z.infer<typeof bootstrapImageSchema>;
