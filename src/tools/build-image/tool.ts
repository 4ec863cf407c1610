/**
 * Build every variant of a catalog image for all configured platforms.
 *
 * Per variant: optional pre-flight verification, the multi-arch buildx build and,
 * when pushing, manifest inspection, keyless signing and a push notification.
 * Without push the build runs as a dry run that proves the image still builds.
 *
 * @example
 * ```typescript
 * const result = await buildImage({ image: 'python-distroless' }, context);
 * ```
 */

import type { Logger } from 'pino';

import { resolveImage, type CatalogImage } from '@/catalog/image-catalog';
import { LATEST_TAG, VERSION_BUILD_ARG } from '@/config/constants';
import { createBuildxClient, type BuildxClient } from '@/infra/docker/buildx';
import { createTrivyScanner } from '@/infra/security/trivy-scanner';
import { createCosignSigner } from '@/infra/signing/cosign';
import { setupToolContext } from '@/lib/tool-helpers';
import type { ToolContext } from '@/types/context';
import { Failure, Success, type Result } from '@/types/core';
import { tool } from '@/types/tool';
import { notifyPush } from '../notify-push/tool';
import { runPreflight, type SmokeTestOutcome } from './preflight';
import { type BuildImageParams, buildImageSchema } from './schema';

export interface VersionBuildReport {
  version: string;
  /** Fully qualified tags applied by the multi-arch build */
  tags: string[];
  latest: boolean;
  verified: boolean;
  scanned: boolean;
  smokeTest: SmokeTestOutcome | 'not-run';
  pushed: boolean;
  signed: boolean;
  digest?: string;
}

export interface BuildImageReport {
  image: string;
  repository: string;
  platforms: string[];
  versions: VersionBuildReport[];
}

/**
 * Make sure buildx is installed and the configured builder exists and is selected
 */
export async function ensureBuilder(buildx: BuildxClient, builder: string, logger: Logger): Promise<Result<void>> {
  if (!(await buildx.isInstalled())) {
    return Failure("'docker buildx' is not available. Please install the Docker Buildx plugin.", {
      message: "'docker buildx' is not available",
      resolution: 'Install the Docker Buildx plugin (docker-buildx package or Docker Desktop).',
    });
  }

  if (await buildx.builderExists(builder)) {
    logger.debug({ builder }, 'Builder already exists');
    return Success(undefined);
  }

  const created = await buildx.createBuilder({ name: builder, driver: 'docker-container' });
  if (!created.ok) return created;
  const selected = await buildx.useBuilder(builder);
  if (!selected.ok) return selected;
  return buildx.bootstrap();
}

/**
 * Tags for one variant; only the highest variant also moves `latest`
 */
export function versionTags(image: CatalogImage, version: string): string[] {
  const tags = [`${image.repository}:${version}`];
  if (version === image.latestVersion) {
    tags.push(`${image.repository}:${LATEST_TAG}`);
  }
  return tags;
}

async function buildVersion(
  image: CatalogImage,
  version: string,
  buildx: BuildxClient,
  context: ToolContext,
  logger: Logger,
): Promise<Result<VersionBuildReport>> {
  const { push, scan, platforms } = context.config.build;
  const tags = versionTags(image, version);
  const primaryRef = `${image.repository}:${version}`;

  logger.info({ push, scan }, `Building ${primaryRef} (${platforms.join(',')})`);

  const report: VersionBuildReport = {
    version,
    tags,
    latest: version === image.latestVersion,
    verified: false,
    scanned: false,
    smokeTest: 'not-run',
    pushed: false,
    signed: false,
  };

  if (scan) {
    const preflight = await runPreflight(image, version, {
      config: context.config,
      runner: context.runner,
      buildx,
      trivy: createTrivyScanner(context.runner, logger),
      docker: context.docker,
      logger,
    });
    if (!preflight.ok) return preflight;
    report.verified = true;
    report.scanned = preflight.value.scanned;
    report.smokeTest = preflight.value.smokeTest;
  } else {
    logger.info('Skipping Pre-flight Verification (SCAN_IMAGES=false)');
  }

  if (!push) {
    logger.info('Dry Run (Push disabled)');
  }
  const built = await buildx.build({
    context: image.dir,
    dockerfile: image.dockerfile,
    platforms,
    tags,
    buildArgs: { [VERSION_BUILD_ARG]: version },
    push,
  });
  if (!built.ok) return built;

  if (!push) {
    logger.info(`Build Successful. Would have pushed: ${primaryRef}`);
    return Success(report);
  }

  report.pushed = true;
  logger.info(`Pushed ${primaryRef}`);

  const shown = await buildx.showManifest(primaryRef);
  if (!shown.ok) return shown;

  const digest = await buildx.manifestDigest(primaryRef);
  if (digest.ok) {
    report.digest = digest.value;
  } else {
    logger.warn({ reference: primaryRef, error: digest.error }, 'Could not read manifest digest');
  }

  const cosign = createCosignSigner(context.runner, logger);
  if (await cosign.isAvailable()) {
    for (const tag of tags) {
      const signed = await cosign.sign(tag);
      if (!signed.ok) return signed;
    }
    report.signed = true;
    logger.info('Image signed successfully.');
  } else {
    logger.warn('cosign not found, skipping image signing.');
  }

  if (report.digest && context.config.notifications.discordWebhook) {
    await notifyPush({ image: image.repository, tag: version, digest: report.digest }, context);
  }

  return Success(report);
}

/**
 * Build all variants of a resolved image; the first failing variant stops the image
 */
export async function buildCatalogImage(
  image: CatalogImage,
  buildx: BuildxClient,
  context: ToolContext,
  logger: Logger,
): Promise<Result<BuildImageReport>> {
  const report: BuildImageReport = {
    image: image.name,
    repository: image.repository,
    platforms: context.config.build.platforms,
    versions: [],
  };

  for (const version of image.versions) {
    const result = await buildVersion(image, version, buildx, context, logger.child({ version }));
    if (!result.ok) {
      return Failure(`${image.name}:${version}: ${result.error}`, result.guidance);
    }
    report.versions.push(result.value);
  }
  return Success(report);
}

async function handleBuildImage(params: BuildImageParams, context: ToolContext): Promise<Result<BuildImageReport>> {
  const { logger, timer } = setupToolContext(context, 'build-image');

  const image = await resolveImage(context.config, params.image);
  if (!image.ok) {
    timer.error(image.error);
    return image;
  }

  const buildx = createBuildxClient(context.runner, logger);
  const ready = await ensureBuilder(buildx, context.config.build.builder, logger);
  if (!ready.ok) {
    timer.error(ready.error);
    return ready;
  }

  const result = await buildCatalogImage(image.value, buildx, context, logger.child({ image: params.image }));
  if (!result.ok) {
    timer.error(result.error);
    return result;
  }

  timer.end({ image: params.image, versions: result.value.versions.length });
  return Success(result.value);
}

export const buildImage = handleBuildImage;

export default tool({
  name: 'build-image',
  description: 'Build, verify and optionally push every variant of one catalog image',
  category: 'build',
  schema: buildImageSchema,
  handler: handleBuildImage,
});
