/**
 * GitHub Actions build matrix of every (image, version) pair.
 *
 * Level 2 images build on images from the internal registry, so CI runs the
 * level 1 matrix first and the level 2 matrix after it.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';

import { buildLevel, imagesRoot, listImageNames, loadVariants, readBaseImage } from '@/catalog/image-catalog';
import { DOCKERFILE, VARIANTS_FILE, VERSION_FILE } from '@/config/constants';
import { setupToolContext } from '@/lib/tool-helpers';
import type { ToolContext } from '@/types/context';
import { Success, type Result } from '@/types/core';
import { tool } from '@/types/tool';
import { type GenerateMatrixParams, generateMatrixSchema } from './schema';

export interface MatrixEntry {
  image: string;
  version: string;
}

export interface BuildMatrix {
  include: MatrixEntry[];
}

const byCodePoint = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

async function handleGenerateMatrix(params: GenerateMatrixParams, context: ToolContext): Promise<Result<BuildMatrix>> {
  const { logger, timer } = setupToolContext(context, 'generate-matrix');
  const root = imagesRoot(context.config);

  const names = await listImageNames(root);
  if (!names.ok) return names;

  const include: MatrixEntry[] = [];
  for (const name of names.value) {
    const dir = join(root, name);
    const level = buildLevel(await readBaseImage(join(dir, DOCKERFILE)), context.config.registry.host);
    if (params.level !== undefined && level !== params.level) continue;

    // Directories without a variant file are not images
    if (!existsSync(join(dir, VARIANTS_FILE)) && !existsSync(join(dir, VERSION_FILE))) {
      logger.debug({ image: name }, 'No variant file, skipping');
      continue;
    }
    const versions = await loadVariants(dir, name);
    if (!versions.ok) return versions;

    for (const version of versions.value) {
      include.push({ image: name, version });
    }
  }

  include.sort((a, b) => byCodePoint(a.image, b.image) || byCodePoint(a.version, b.version));

  timer.end({ level: params.level, entries: include.length });
  return Success({ include });
}

export const generateMatrix = handleGenerateMatrix;

export default tool({
  name: 'generate-matrix',
  description: 'Emit the GitHub Actions build matrix for the image catalog',
  category: 'utility',
  schema: generateMatrixSchema,
  handler: handleGenerateMatrix,
});
