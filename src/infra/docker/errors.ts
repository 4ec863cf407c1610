/**
 * Docker daemon error guidance built from dockerode's error shape
 * (`statusCode`, `json.message`, `reason`) and Node system error codes.
 */

import type { ErrorGuidance } from '@/types/core';
import {
  codePattern,
  createErrorGuidanceBuilder,
  customPattern,
  messagePattern,
  type ErrorPattern,
} from '@/lib/error-guidance';
import { extractErrorMessage } from '@/lib/error-utils';

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Prefer the daemon's JSON message over the generic HTTP wrapper text
 */
function daemonMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'json' in error) {
    const json: unknown = error.json;
    if (json && typeof json === 'object' && 'message' in json && typeof json.message === 'string' && json.message) {
      return json.message;
    }
  }
  if (
    typeof error === 'object' &&
    error !== null &&
    'reason' in error &&
    typeof error.reason === 'string' &&
    error.reason
  ) {
    return error.reason;
  }
  return extractErrorMessage(error);
}

function details(error: unknown): Record<string, unknown> {
  const statusCode = statusCodeOf(error);
  return statusCode === undefined ? {} : { statusCode };
}

function statusPattern(matches: (status: number) => boolean, build: (error: unknown) => ErrorGuidance): ErrorPattern {
  return customPattern((error) => {
    const status = statusCodeOf(error);
    return status !== undefined && matches(status);
  }, build);
}

const dockerErrorPatterns: ErrorPattern[] = [
  codePattern('ECONNREFUSED', {
    message: 'Docker daemon is not available',
    hint: 'Connection to Docker daemon was refused',
    resolution: 'Ensure Docker is running: `docker ps` should succeed.',
  }),
  messagePattern('connect ENOENT', {
    message: 'Docker daemon is not running',
    hint: 'Cannot connect to Docker socket',
    resolution: 'Start the Docker daemon, or set DOCKER_HOST to a reachable daemon.',
  }),
  codePattern('ETIMEDOUT', {
    message: 'Docker operation timed out',
    hint: 'The operation took too long and was cancelled',
    resolution: 'Check network connectivity to the daemon and the registry, then retry.',
  }),
  statusPattern(
    (status) => status === 401,
    (error) => ({
      message: 'Docker registry authentication failed',
      hint: 'Invalid or missing registry credentials',
      resolution: 'Check NEXUS_PUBLISH_USERNAME and NEXUS_PUBLISH_PASSWORD.',
      details: details(error),
    }),
  ),
  statusPattern(
    (status) => status === 403,
    (error) => ({
      message: 'Access denied to registry resource',
      hint: 'The credentials lack push permission for this repository',
      resolution: 'Grant the publishing account write access to the target namespace.',
      details: details(error),
    }),
  ),
  statusPattern(
    (status) => status === 404,
    (error) => ({
      message: daemonMessage(error),
      hint: 'The image does not exist in the local daemon',
      resolution: 'List local images with `docker images`; the build may not have used --load.',
      details: details(error),
    }),
  ),
  statusPattern(
    (status) => status === 409,
    (error) => ({
      message: daemonMessage(error),
      hint: 'The image is still referenced by a container',
      resolution: 'Remove stopped containers using the image, or remove it with force.',
      details: details(error),
    }),
  ),
  statusPattern(
    (status) => status >= 500,
    (error) => ({
      message: daemonMessage(error),
      hint: `Docker daemon returned HTTP ${statusCodeOf(error) ?? 500}`,
      resolution: 'Check the daemon logs, then retry.',
      details: details(error),
    }),
  ),
];

export const extractDockerErrorGuidance = createErrorGuidanceBuilder(dockerErrorPatterns, (error) => ({
  message: daemonMessage(error),
  hint: 'Docker operation failed',
  resolution: 'Check the error message and the daemon logs for details.',
  details: details(error),
}));
