/**
 * Pre-flight verification of one variant before anything is pushed: a
 * single-arch build loaded into the local daemon, a Trivy gate and a smoke test.
 * The local image is removed whatever the outcome.
 */

import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { Logger } from 'pino';

import type { CatalogImage } from '@/catalog/image-catalog';
import type { FactoryConfig } from '@/config/app-config';
import {
  LOCAL_SCAN_TAG_PREFIX,
  SMOKE_TEST_SCRIPT,
  VERIFICATION_PLATFORM,
  VERSION_BUILD_ARG,
} from '@/config/constants';
import type { BuildxClient } from '@/infra/docker/buildx';
import type { DockerClient } from '@/infra/docker/client';
import type { CommandRunner } from '@/infra/exec/command-runner';
import type { TrivyScanner } from '@/infra/security/trivy-scanner';
import { Failure, Success, type Result } from '@/types/core';

export type SmokeTest =
  | { kind: 'script'; script: string }
  | { kind: 'python'; script: string };

export type SmokeTestOutcome = 'passed' | 'none';

export interface PreflightOutcome {
  localTag: string;
  /** False when trivy was not installed and the scan was skipped */
  scanned: boolean;
  smokeTest: SmokeTestOutcome;
}

export interface PreflightDeps {
  config: FactoryConfig;
  runner: CommandRunner;
  buildx: BuildxClient;
  trivy: TrivyScanner;
  docker: () => DockerClient;
  logger: Logger;
}

export function localScanTag(imageName: string, version: string): string {
  return `${LOCAL_SCAN_TAG_PREFIX}${imageName}:${version}`;
}

/**
 * An image's own test.sh wins; python images fall back to the shared hello.py
 */
export function resolveSmokeTest(image: CatalogImage, config: FactoryConfig): SmokeTest | undefined {
  const script = join(image.dir, SMOKE_TEST_SCRIPT);
  if (existsSync(script)) {
    return { kind: 'script', script };
  }

  if (image.name.includes('python')) {
    const hello = join(config.workspaceDir, config.layout.testsDir, 'python', 'hello.py');
    if (existsSync(hello)) {
      return { kind: 'python', script: hello };
    }
  }
  return undefined;
}

async function removeLocalImage(deps: PreflightDeps, localTag: string): Promise<void> {
  const removed = await deps.docker().removeImage(localTag);
  if (!removed.ok) {
    deps.logger.warn({ localTag, error: removed.error }, 'Could not remove local verification image');
  }
}

async function runSmokeTest(
  smokeTest: SmokeTest,
  localTag: string,
  version: string,
  deps: PreflightDeps,
): Promise<Result<number>> {
  const cwd = deps.config.workspaceDir;
  if (smokeTest.kind === 'script') {
    return deps.runner.stream('bash', [smokeTest.script, localTag, version], { cwd });
  }
  // Piped on stdin: a bind mount is not visible to a docker-in-docker daemon
  return deps.runner.stream(
    'docker',
    ['run', '--rm', '-i', '-e', `EXPECTED_VERSION=${version}`, localTag, '-'],
    { cwd, inputFile: smokeTest.script },
  );
}

export async function runPreflight(
  image: CatalogImage,
  version: string,
  deps: PreflightDeps,
): Promise<Result<PreflightOutcome>> {
  const { config, logger } = deps;
  const localTag = localScanTag(image.name, version);
  logger.info({ platform: VERIFICATION_PLATFORM, localTag }, `Pre-flight verification (${VERIFICATION_PLATFORM})...`);

  const built = await deps.buildx.build({
    context: image.dir,
    dockerfile: image.dockerfile,
    platforms: [VERIFICATION_PLATFORM],
    tags: [localTag],
    buildArgs: { [VERSION_BUILD_ARG]: version },
    load: true,
  });
  if (!built.ok) return built;

  let scanned = false;
  if (await deps.trivy.isAvailable()) {
    const gate = await deps.trivy.gate(localTag, {
      severities: config.security.severities,
      ignoreFile: resolve(config.workspaceDir, config.security.ignoreFile),
    });
    if (!gate.ok || !gate.value.passed) {
      await removeLocalImage(deps, localTag);
      if (!gate.ok) return gate;
      return Failure('Trivy found Critical/High vulnerabilities!', {
        message: 'Trivy found Critical/High vulnerabilities!',
        hint: 'Fixable findings at the gated severities block the push',
        resolution: `Update the base image or packages, or list accepted findings in ${config.security.ignoreFile}.`,
        details: { localTag, version },
      });
    }
    scanned = true;
    logger.info('Scan passed.');
  } else {
    logger.warn('Trivy not found. Skipping security scan.');
  }

  let smokeOutcome: SmokeTestOutcome = 'none';
  const smokeTest = resolveSmokeTest(image, config);
  if (smokeTest) {
    logger.info({ script: smokeTest.script }, 'Running smoke test');
    const result = await runSmokeTest(smokeTest, localTag, version, deps);
    if (!result.ok || result.value !== 0) {
      await removeLocalImage(deps, localTag);
      if (!result.ok) return result;
      return Failure('Smoke test failed', {
        message: 'Smoke test failed',
        hint: `${smokeTest.script} exited with code ${result.value}`,
        details: { localTag, version },
      });
    }
    smokeOutcome = 'passed';
    logger.info('Smoke Test Passed!');
  } else {
    logger.info(`No smoke test defined for ${image.name}`);
  }

  await removeLocalImage(deps, localTag);
  return Success({ localTag, scanned, smokeTest: smokeOutcome });
}
