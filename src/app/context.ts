/**
 * ToolContext Factory
 *
 * Single place for creating ToolContext instances. Collaborators that reach
 * outside the process can be replaced, which is how tests run tools without
 * docker, trivy or the network.
 */

import type { Logger } from 'pino';

import type { FactoryConfig } from '@/config/app-config';
import { createDockerClient, type DockerClient } from '@/infra/docker/client';
import { createCommandRunner, type CommandRunner } from '@/infra/exec/command-runner';
import type { FetchFn, ToolContext } from '@/types/context';

export interface ToolContextDeps {
  config: FactoryConfig;
  logger: Logger;
  runner?: CommandRunner;
  docker?: DockerClient;
  fetch?: FetchFn;
}

/**
 * Create a ToolContext with all standard dependencies
 *
 * @example
 * ```typescript
 * const context = createToolContext({ config: createFactoryConfig(), logger });
 * const result = await executeTool(buildImageTool, { image: 'python-distroless' }, context);
 * ```
 */
export function createToolContext(deps: ToolContextDeps): ToolContext {
  let docker = deps.docker;

  return {
    config: deps.config,
    logger: deps.logger,
    runner: deps.runner ?? createCommandRunner(deps.logger.child({ component: 'exec' })),
    docker: () => {
      docker ??= createDockerClient(deps.logger.child({ component: 'docker' }));
      return docker;
    },
    fetch: deps.fetch ?? ((input, init) => fetch(input, init)),
  };
}
