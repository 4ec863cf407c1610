/**
 * Build every image in the catalog, one after another.
 *
 * A failing image does not stop the others unless failFast is set; the overall
 * result is a Failure whenever any image failed, with the per-image outcomes in
 * the guidance details.
 */

import { imagesRoot, listImageNames, resolveImage } from '@/catalog/image-catalog';
import { createBuildxClient } from '@/infra/docker/buildx';
import { setupToolContext } from '@/lib/tool-helpers';
import type { ToolContext } from '@/types/context';
import { Failure, Success, type Result } from '@/types/core';
import { tool } from '@/types/tool';
import { buildCatalogImage, ensureBuilder, type BuildImageReport } from '../build-image/tool';
import { type BuildAllParams, buildAllSchema } from './schema';

export type ImageOutcome =
  | { image: string; ok: true; report: BuildImageReport }
  | { image: string; ok: false; error: string };

export interface BuildAllResult {
  outcomes: ImageOutcome[];
  failed: string[];
}

async function handleBuildAll(params: BuildAllParams, context: ToolContext): Promise<Result<BuildAllResult>> {
  const { logger, timer } = setupToolContext(context, 'build-all');

  const names = await listImageNames(imagesRoot(context.config));
  if (!names.ok) {
    timer.error(names.error);
    return names;
  }

  const buildx = createBuildxClient(context.runner, logger);
  const ready = await ensureBuilder(buildx, context.config.build.builder, logger);
  if (!ready.ok) {
    timer.error(ready.error);
    return ready;
  }

  const outcomes: ImageOutcome[] = [];
  for (const name of names.value) {
    const imageLogger = logger.child({ image: name });
    const image = await resolveImage(context.config, name);
    const result = image.ok ? await buildCatalogImage(image.value, buildx, context, imageLogger) : image;

    if (result.ok) {
      outcomes.push({ image: name, ok: true, report: result.value });
    } else {
      imageLogger.error({ error: result.error }, 'Image build failed');
      outcomes.push({ image: name, ok: false, error: result.error });
      if (params.failFast) break;
    }
  }

  const failed = outcomes.filter((outcome) => !outcome.ok).map((outcome) => outcome.image);
  const summary: BuildAllResult = { outcomes, failed };

  if (failed.length > 0) {
    timer.error(`${failed.length} image(s) failed`, { failed });
    return Failure(`${failed.length} of ${outcomes.length} image(s) failed: ${failed.join(', ')}`, {
      message: 'Some images failed to build',
      resolution: 'Rebuild a single image with `image-factory build <image>` to see its full output.',
      details: { summary },
    });
  }

  timer.end({ images: outcomes.length });
  return Success(summary);
}

export const buildAll = handleBuildAll;

export default tool({
  name: 'build-all',
  description: 'Build every catalog image sequentially',
  category: 'build',
  schema: buildAllSchema,
  handler: handleBuildAll,
});
