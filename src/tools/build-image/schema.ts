/**
 * Schema definition for build-image tool
 */

import { z } from 'zod';
import { imageName } from '../shared/schemas';

export const buildImageSchema = z.object({
  image: imageName,
});

export type BuildImageParams = z.infer<typeof buildImageSchema>;
