/**
 * Execution context handed to every tool.
 *
 * Everything that reaches outside the process (external CLIs, the Docker daemon,
 * HTTP) goes through this object so tests can substitute in-process fakes.
 */

import type { Logger } from 'pino';
import type { FactoryConfig } from '@/config/app-config';
import type { CommandRunner } from '@/infra/exec/command-runner';
import type { DockerClient } from '@/infra/docker/client';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ToolContext {
  logger: Logger;
  config: FactoryConfig;
  runner: CommandRunner;
  /** Created lazily: most tools never talk to the daemon directly */
  docker: () => DockerClient;
  fetch: FetchFn;
}
