/**
 * docker buildx CLI wrapper.
 *
 * Multi-platform builds, `--load`, SBOM attestations and remote builders are
 * only reachable through the buildx CLI, so these calls go through the command
 * runner instead of the daemon API.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import type { CommandRunner } from '@/infra/exec/command-runner';
import { Failure, Success, type Result } from '@/types/core';

export interface BuildxBuildOptions {
  context: string;
  dockerfile?: string;
  platforms: string[];
  tags: string[];
  buildArgs?: Record<string, string>;
  /** Load the single-platform result into the local daemon */
  load?: boolean;
  /** Push to the registry with an SBOM attestation */
  push?: boolean;
}

export interface CreateBuilderOptions {
  name: string;
  driver?: string;
  platform?: string;
  /** Make it the current builder */
  use?: boolean;
  /** Remote node, e.g. ssh://builder@host */
  endpoint?: string;
}

const ManifestSchema = z.object({ digest: z.string().startsWith('sha256:') }).passthrough();

/**
 * Argument vector for `docker buildx build`
 */
export function buildxBuildArgs(options: BuildxBuildOptions): string[] {
  const args = ['buildx', 'build'];
  if (options.load) {
    args.push('--load');
  }
  args.push('--platform', options.platforms.join(','));
  for (const [key, value] of Object.entries(options.buildArgs ?? {})) {
    args.push('--build-arg', `${key}=${value}`);
  }
  for (const tag of options.tags) {
    args.push('--tag', tag);
  }
  if (options.dockerfile) {
    args.push('--file', options.dockerfile);
  }
  if (options.push) {
    args.push('--push', '--sbom=true');
  }
  args.push(options.context);
  return args;
}

export interface BuildxClient {
  /** True when the buildx plugin answers `docker buildx version` */
  isInstalled(): Promise<boolean>;
  builderExists(name: string): Promise<boolean>;
  /** Builder names as listed by `docker buildx ls` */
  listBuilders(): Promise<Result<string[]>>;
  createBuilder(options: CreateBuilderOptions): Promise<Result<void>>;
  useBuilder(name: string): Promise<Result<void>>;
  bootstrap(): Promise<Result<void>>;
  build(options: BuildxBuildOptions): Promise<Result<void>>;
  /** Prints the manifest list of a pushed reference to the terminal */
  showManifest(reference: string): Promise<Result<void>>;
  manifestDigest(reference: string): Promise<Result<string>>;
}

export function createBuildxClient(runner: CommandRunner, logger: Logger): BuildxClient {
  const streamStep = async (args: string[], description: string): Promise<Result<void>> => {
    const result = await runner.stream('docker', args);
    if (!result.ok) return result;
    if (result.value !== 0) {
      return Failure(`${description} failed with exit code ${result.value}`, {
        message: `${description} failed`,
        hint: 'See the docker buildx output above',
        details: { args, exitCode: result.value },
      });
    }
    return Success(undefined);
  };

  return {
    async isInstalled() {
      const result = await runner.run('docker', ['buildx', 'version']);
      return result.ok && result.value.exitCode === 0;
    },

    async builderExists(name) {
      const result = await runner.run('docker', ['buildx', 'inspect', name]);
      return result.ok && result.value.exitCode === 0;
    },

    async listBuilders() {
      const result = await runner.run('docker', ['buildx', 'ls']);
      if (!result.ok) return result;
      if (result.value.exitCode !== 0) {
        return Failure(`docker buildx ls failed: ${result.value.stderr.trim()}`);
      }
      // Builder rows start at column 0, node rows are indented; `*` marks the current builder
      const names = result.value.stdout
        .split('\n')
        .slice(1)
        .filter((line) => line.length > 0 && !/^\s/.test(line))
        .map((line) => line.split(/\s+/)[0]?.replace(/\*$/, '') ?? '')
        .filter(Boolean);
      return Success(names);
    },

    createBuilder(options) {
      const args = ['buildx', 'create', '--name', options.name, '--driver', options.driver ?? 'docker-container'];
      if (options.platform) args.push('--platform', options.platform);
      if (options.use) args.push('--use');
      if (options.endpoint) args.push(options.endpoint);
      logger.info({ builder: options.name, endpoint: options.endpoint }, 'Creating buildx builder');
      return streamStep(args, `Creating builder ${options.name}`);
    },

    useBuilder(name) {
      return streamStep(['buildx', 'use', name], `Selecting builder ${name}`);
    },

    bootstrap() {
      return streamStep(['buildx', 'inspect', '--bootstrap'], 'Bootstrapping builder');
    },

    build(options) {
      return streamStep(buildxBuildArgs(options), `Build of ${options.tags.join(', ')}`);
    },

    showManifest(reference) {
      return streamStep(['buildx', 'imagetools', 'inspect', reference], `Manifest inspection of ${reference}`);
    },

    async manifestDigest(reference) {
      const result = await runner.run('docker', [
        'buildx',
        'imagetools',
        'inspect',
        reference,
        '--format',
        '{{json .Manifest}}',
      ]);
      if (!result.ok) return result;
      if (result.value.exitCode !== 0) {
        return Failure(`Could not inspect ${reference}: ${result.value.stderr.trim()}`);
      }

      let manifest: unknown;
      try {
        manifest = JSON.parse(result.value.stdout);
      } catch {
        return Failure(`Unexpected imagetools output for ${reference}`, {
          message: 'Manifest output was not JSON',
          details: { outputPreview: result.value.stdout.substring(0, 200) },
        });
      }
      const parsed = ManifestSchema.safeParse(manifest);
      if (!parsed.success) {
        return Failure(`Manifest of ${reference} has no digest`);
      }
      return Success(parsed.data.digest);
    },
  };
}
