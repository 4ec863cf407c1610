/**
 * Schema definition for notify-push tool
 */

import { z } from 'zod';
import { imageTag } from '../shared/schemas';

export const notifyPushSchema = z.object({
  image: z.string().min(1).describe('Pushed repository, e.g. registry.local/docker-hosted/base/python-distroless'),
  tag: imageTag,
  digest: z.string().min(1).describe('Manifest digest of the pushed tag'),
});

export type NotifyPushParams = z.infer<typeof notifyPushSchema>;
