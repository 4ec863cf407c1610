/**
 * Programmatic API for image-factory: the same operations the CLI runs, for
 * use from other Node.js tooling.
 */

/** @public */
export { createToolContext, type ToolContextDeps } from './app/context';
/** @public */
export { executeTool, validateParams } from './app/execute';

/** @public */
export { createFactoryConfig, imageRepository, type FactoryConfig, type ConfigOverrides } from './config/app-config';

/** @public */
export type { Result, ErrorGuidance, ToolContext, FactoryTool, ToolCategory } from './types/index';
/** @public */
export { Success, Failure, tool } from './types/index';

// Export tool helper utilities
export { getToolLogger, createToolTimer, setupToolContext } from './lib/tool-helpers';
export { createLogger } from './lib/logger';

/** @public */
export {
  ALL_TOOLS,
  TOOL_NAME,
  bootstrapImageTool,
  buildAllTool,
  buildImageTool,
  checkPinnedDepsTool,
  checkScanResultsTool,
  checkUpstreamVersionsTool,
  createUpdatePrTool,
  formatReportTool,
  generateMatrixTool,
  healthCheckTool,
  notifyPushTool,
} from './tools/index';

/** @public */
export type { DependencyReport, DependencyUpdate } from './tools/shared/dependency-report';
/** @public */
export type { CatalogImage, BuildLevel } from './catalog/image-catalog';
