/**
 * Docker daemon endpoint detection: DOCKER_HOST, then local sockets with Colima support
 */

import { statSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Get Colima socket paths in order of preference.
 */
function getColimaSockets(): string[] {
  const homeDir = homedir();
  return [
    join(homeDir, '.colima/default/docker.sock'),
    join(homeDir, '.colima/docker/docker.sock'),
    join(homeDir, '.lima/colima/sock/docker.sock'), // Lima-based colima
  ];
}

function findAvailableDockerSocket(socketPaths: string[]): string | null {
  for (const socketPath of socketPaths) {
    if (statSync(socketPath, { throwIfNoEntry: false })?.isSocket()) {
      return socketPath;
    }
  }
  return null;
}

/**
 * Where dockerode connects: a unix socket, or a daemon reached over TCP
 */
export type DockerEndpoint =
  | { socketPath: string }
  | { protocol: 'http' | 'https'; host: string; port: number };

const REMOTE_HOST_PATTERN = /^(tcp|http|https):\/\//;

/**
 * Socket path for the local daemon: `DOCKER_SOCKET`, a `unix://` DOCKER_HOST,
 * the standard socket, then Colima's.
 */
export function autoDetectDockerSocket(env: NodeJS.ProcessEnv = process.env): string {
  if (env.DOCKER_SOCKET) {
    return env.DOCKER_SOCKET;
  }
  if (env.DOCKER_HOST?.startsWith('unix://')) {
    return env.DOCKER_HOST.slice('unix://'.length);
  }

  const availableSocket = findAvailableDockerSocket(['/var/run/docker.sock', ...getColimaSockets()]);
  return availableSocket ?? '/var/run/docker.sock';
}

/**
 * Endpoint named by a `tcp://`, `http://` or `https://` DOCKER_HOST (e.g. a
 * docker:dind service in CI). `DOCKER_SOCKET` and any other DOCKER_HOST value
 * go through socket detection.
 */
export function resolveDockerEndpoint(env: NodeJS.ProcessEnv = process.env): DockerEndpoint {
  const dockerHost = env.DOCKER_HOST;
  if (env.DOCKER_SOCKET || !dockerHost || !REMOTE_HOST_PATTERN.test(dockerHost)) {
    return { socketPath: autoDetectDockerSocket(env) };
  }

  const url = new URL(dockerHost);
  const https = url.protocol === 'https:';
  return {
    protocol: https ? 'https' : 'http',
    host: url.hostname,
    port: url.port ? Number(url.port) : https ? 2376 : 2375,
  };
}
