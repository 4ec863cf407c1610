/**
 * Docker daemon client for the operations that need the daemon rather than
 * the buildx CLI: image removal, authenticated push and version queries.
 */

import Docker, { type DockerOptions } from 'dockerode';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '@/types/core';
import { extractDockerErrorGuidance } from './errors';
import { resolveDockerEndpoint } from './socket-validation';

/**
 * Docker client configuration options.
 */
export interface DockerClientConfig {
  /** Docker socket path (defaults to DOCKER_HOST, then auto-detection with Colima support) */
  socketPath?: string;
  /** Connection timeout in milliseconds */
  timeout?: number;
}

/**
 * Registry credentials in the shape the daemon's push endpoint expects
 */
export interface RegistryAuthConfig {
  username: string;
  password: string;
  serveraddress: string;
}

export interface DockerPushResult {
  /** Content-addressable digest of the pushed manifest */
  digest: string;
  size?: number;
}

export interface DockerVersionInfo {
  version: string;
  apiVersion: string;
}

/**
 * Docker client interface for daemon operations.
 */
export interface DockerClient {
  /**
   * Removes a local image.
   * @param force - Force removal even when tagged in several repositories
   */
  removeImage: (imageId: string, force?: boolean) => Promise<Result<void>>;

  /**
   * Pushes `<repository>:<tag>` from the local daemon to its registry.
   */
  pushImage: (
    repository: string,
    tag: string,
    authConfig?: RegistryAuthConfig,
  ) => Promise<Result<DockerPushResult>>;

  version: () => Promise<Result<DockerVersionInfo>>;
}

interface DockerPushEvent {
  status?: string;
  error?: string;
  errorDetail?: { message?: string };
  aux?: {
    Digest?: string;
    Size?: number;
  };
}

function createBaseDockerClient(docker: Docker, logger: Logger): DockerClient {
  const failWith = <T>(operation: string, error: unknown, context: Record<string, unknown>): Result<T> => {
    const guidance = extractDockerErrorGuidance(error);
    const errorMessage = `Failed to ${operation}: ${guidance.message}`;

    logger.error(
      {
        error: errorMessage,
        hint: guidance.hint,
        resolution: guidance.resolution,
        errorDetails: guidance.details,
        ...context,
      },
      `Docker ${operation} failed`,
    );

    return Failure(errorMessage, guidance);
  };

  return {
    async removeImage(imageId: string, force = false): Promise<Result<void>> {
      try {
        logger.debug({ imageId, force }, 'Starting Docker image removal');
        await docker.getImage(imageId).remove({ force });
        logger.debug({ imageId }, 'Image removed');
        return Success(undefined);
      } catch (error) {
        return failWith('remove image', error, { imageId });
      }
    },

    async pushImage(
      repository: string,
      tag: string,
      authConfig?: RegistryAuthConfig,
    ): Promise<Result<DockerPushResult>> {
      try {
        const image = docker.getImage(`${repository}:${tag}`);
        // dockerode's Image.push expects auth config inside the first options object
        const stream = await image.push(authConfig ? { authconfig: authConfig } : {});

        let digest = '';
        let size: number | undefined;

        await new Promise<void>((resolve, reject) => {
          let pushError: Error | null = null;

          docker.modem.followProgress(
            stream,
            (err: Error | null) => {
              if (err) {
                reject(err);
              } else if (pushError) {
                // Reject if we encountered an error event during the push
                reject(pushError);
              } else {
                resolve();
              }
            },
            (event: DockerPushEvent) => {
              logger.debug(event, 'Docker push progress');

              if (event.error || event.errorDetail) {
                pushError = new Error(event.error ?? event.errorDetail?.message ?? 'Unknown push error');
              }
              if (event.aux?.Digest) {
                digest = event.aux.Digest;
              }
              if (event.aux?.Size) {
                size = event.aux.Size;
              }
            },
          );
        });

        if (!digest) {
          const inspectResult = await image.inspect();
          const repoDigest = inspectResult.RepoDigests?.find((entry) => entry.startsWith(`${repository}@`));
          digest = repoDigest?.split('@')[1] ?? '';
        }

        if (!digest) {
          return Failure(`Push of ${repository}:${tag} reported no digest`, {
            message: 'Registry did not report a manifest digest',
            hint: 'The push completed but the digest could not be determined',
            resolution: `Resolve it manually: crane digest ${repository}:${tag}`,
          });
        }

        logger.info({ repository, tag, digest }, 'Image pushed successfully');
        const result: DockerPushResult = { digest };
        if (size !== undefined) {
          result.size = size;
        }
        return Success(result);
      } catch (error) {
        return failWith('push image', error, { repository, tag });
      }
    },

    async version(): Promise<Result<DockerVersionInfo>> {
      try {
        const info = await docker.version();
        return Success({ version: info.Version, apiVersion: info.ApiVersion });
      } catch (error) {
        return failWith('query daemon version', error, {});
      }
    },
  };
}

/**
 * dockerode connection options: an explicit socket, else the endpoint DOCKER_HOST names
 */
export function dockerConnectionOptions(
  config: DockerClientConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): DockerOptions {
  const dockerOptions: DockerOptions = config.socketPath
    ? { socketPath: config.socketPath }
    : { ...resolveDockerEndpoint(env) };
  if (config.timeout) {
    dockerOptions.timeout = config.timeout;
  }
  return dockerOptions;
}

/**
 * Create a Docker client bound to the detected daemon
 */
export const createDockerClient = (logger: Logger, config: DockerClientConfig = {}): DockerClient => {
  const dockerOptions = dockerConnectionOptions(config);
  logger.debug({ dockerOptions }, 'Created Docker client');
  return createBaseDockerClient(new Docker(dockerOptions), logger);
};
