import bootstrapImageTool from './bootstrap-image/tool';
import buildAllTool from './build-all/tool';
import buildImageTool from './build-image/tool';
import checkPinnedDepsTool from './check-pinned-deps/tool';
import checkScanResultsTool from './check-scan-results/tool';
import checkUpstreamVersionsTool from './check-upstream-versions/tool';
import createUpdatePrTool from './create-update-pr/tool';
import formatReportTool from './format-report/tool';
import generateMatrixTool from './generate-matrix/tool';
import healthCheckTool from './health-check/tool';
import notifyPushTool from './notify-push/tool';

export const TOOL_NAME = {
  BOOTSTRAP_IMAGE: 'bootstrap-image',
  BUILD_ALL: 'build-all',
  BUILD_IMAGE: 'build-image',
  CHECK_PINNED_DEPS: 'check-pinned-deps',
  CHECK_SCAN_RESULTS: 'check-scan-results',
  CHECK_UPSTREAM_VERSIONS: 'check-upstream-versions',
  CREATE_UPDATE_PR: 'create-update-pr',
  FORMAT_REPORT: 'format-report',
  GENERATE_MATRIX: 'generate-matrix',
  HEALTH_CHECK: 'health-check',
  NOTIFY_PUSH: 'notify-push',
} as const;

export type ToolName = (typeof TOOL_NAME)[keyof typeof TOOL_NAME];

export type Tool =
  | typeof bootstrapImageTool
  | typeof buildAllTool
  | typeof buildImageTool
  | typeof checkPinnedDepsTool
  | typeof checkScanResultsTool
  | typeof checkUpstreamVersionsTool
  | typeof createUpdatePrTool
  | typeof formatReportTool
  | typeof generateMatrixTool
  | typeof healthCheckTool
  | typeof notifyPushTool;

export const ALL_TOOLS: readonly Tool[] = [
  // Build and publish
  buildImageTool,
  buildAllTool,
  bootstrapImageTool,

  // Security gate
  checkScanResultsTool,

  // Dependency upkeep
  checkPinnedDepsTool,
  checkUpstreamVersionsTool,
  createUpdatePrTool,

  // Reporting
  formatReportTool,
  notifyPushTool,

  // Utilities
  generateMatrixTool,
  healthCheckTool,
] as const;

export {
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
};
