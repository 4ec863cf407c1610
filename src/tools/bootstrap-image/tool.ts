/**
 * Build and publish a single-arch bootstrap image outside the catalog.
 *
 * Bootstrap images (such as the CI runner image the catalog builds run on)
 * cannot come from the CI pipeline itself, so they are built from a workstation,
 * optionally on a remote buildx node, and pushed with publisher credentials.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';

import { createBuildxClient, type BuildxClient } from '@/infra/docker/buildx';
import { formatCommand, type CommandRunner } from '@/infra/exec/command-runner';
import { setupToolContext } from '@/lib/tool-helpers';
import type { ToolContext } from '@/types/context';
import { Failure, Success, type Result } from '@/types/core';
import { tool } from '@/types/tool';
import { type BootstrapImageParams, bootstrapImageSchema } from './schema';

export interface BootstrapImageResult {
  image: string;
  builder: string;
  digest: string;
  caCertInstalled: 'colima' | 'host' | 'already-configured' | 'skipped';
}

export function bootstrapRepository(host: string, namespace: string, name: string): string {
  return `${host}/${namespace}/bootstrap/${name}`;
}

async function prepareBuilder(
  buildx: BuildxClient,
  params: BootstrapImageParams,
  builder: string,
  logger: Logger,
): Promise<Result<void>> {
  const builders = await buildx.listBuilders();
  if (!builders.ok) return builders;

  if (builders.value.includes(builder)) {
    logger.info(`Using existing builder '${builder}'`);
    const selected = await buildx.useBuilder(builder);
    if (!selected.ok) return selected;
  } else {
    logger.info(`Creating builder '${builder}'...`);
    const created = await buildx.createBuilder({
      name: builder,
      driver: 'docker-container',
      platform: params.platform,
      use: true,
      ...(params.endpoint !== undefined && { endpoint: params.endpoint }),
    });
    if (!created.ok) return created;
  }

  return buildx.bootstrap();
}

async function runChecked(runner: CommandRunner, command: string, args: string[], input?: string): Promise<Result<void>> {
  const result = await runner.run(command, args, input === undefined ? {} : { input });
  if (!result.ok) return result;
  if (result.value.exitCode !== 0) {
    return Failure(`${formatCommand(command, args)} failed: ${result.value.stderr.trim()}`);
  }
  return Success(undefined);
}

/**
 * Trust the registry CA for the daemon that will push: inside a running Colima
 * VM when there is one, otherwise through /etc/docker/certs.d on this host.
 */
export async function installRegistryCa(
  runner: CommandRunner,
  registry: string,
  caCert: string,
  logger: Logger,
): Promise<Result<BootstrapImageResult['caCertInstalled']>> {
  if (!existsSync(caCert)) {
    logger.warn({ caCert }, 'CA certificate not found, skipping installation');
    return Success('skipped');
  }

  const certDir = `/etc/docker/certs.d/${registry}`;
  const certPath = `${certDir}/ca.crt`;

  if (await runner.isAvailable('colima')) {
    const status = await runner.run('colima', ['status']);
    if (status.ok && status.value.exitCode === 0) {
      logger.info('Detected Colima VM - installing CA cert in VM...');
      const made = await runChecked(runner, 'colima', ['ssh', '--', 'sudo', 'mkdir', '-p', certDir]);
      if (!made.ok) return made;
      const certificate = await readFile(caCert, 'utf8');
      const written = await runChecked(runner, 'colima', ['ssh', '--', 'sudo', 'tee', certPath], certificate);
      if (!written.ok) return written;
      logger.info(`CA certificate installed in Colima VM for ${registry}`);
      return Success('colima');
    }
  }

  if (existsSync(certPath)) {
    logger.info('CA certificate already configured');
    return Success('already-configured');
  }

  logger.info('Installing CA certificate for Docker...');
  const made = await runChecked(runner, 'sudo', ['mkdir', '-p', certDir]);
  if (!made.ok) return made;
  const linked = await runChecked(runner, 'sudo', ['ln', '-s', caCert, certPath]);
  if (!linked.ok) return linked;
  return Success('host');
}

async function handleBootstrapImage(
  params: BootstrapImageParams,
  context: ToolContext,
): Promise<Result<BootstrapImageResult>> {
  const { logger, timer } = setupToolContext(context, 'bootstrap-image');
  const { host, namespace } = context.config.registry;
  const { username, password } = context.config.publish;

  if (!username) {
    return Failure('NEXUS_PUBLISH_USERNAME environment variable is not set');
  }
  if (!password) {
    return Failure('NEXUS_PUBLISH_PASSWORD environment variable is not set');
  }

  const repository = bootstrapRepository(host, namespace, params.name);
  const image = `${repository}:${params.tag}`;
  const builder = params.builder ?? context.config.build.builder;
  logger.info({ image, platform: params.platform, endpoint: params.endpoint }, 'Building bootstrap image');

  const buildx = createBuildxClient(context.runner, logger);
  const ready = await prepareBuilder(buildx, params, builder, logger);
  if (!ready.ok) {
    timer.error(ready.error);
    return ready;
  }

  const built = await buildx.build({
    context: params.context,
    platforms: [params.platform],
    tags: [image],
    load: true,
  });
  if (!built.ok) {
    timer.error(built.error);
    return built;
  }

  let caCertInstalled: BootstrapImageResult['caCertInstalled'] = 'skipped';
  if (params.caCert) {
    const installed = await installRegistryCa(context.runner, host, params.caCert, logger);
    if (!installed.ok) {
      timer.error(installed.error);
      return installed;
    }
    caCertInstalled = installed.value;
  }

  logger.info('Pushing image...');
  const pushed = await context.docker().pushImage(repository, params.tag, {
    username,
    password,
    serveraddress: host,
  });
  if (!pushed.ok) {
    timer.error(pushed.error);
    return pushed;
  }

  logger.info(`Successfully built and pushed: ${image}`);
  timer.end({ image, digest: pushed.value.digest });
  return Success({ image, builder, digest: pushed.value.digest, caCertInstalled });
}

export const bootstrapImage = handleBootstrapImage;

export default tool({
  name: 'bootstrap-image',
  description: 'Build a single-arch bootstrap image and push it with publisher credentials',
  category: 'build',
  schema: bootstrapImageSchema,
  handler: handleBootstrapImage,
});
