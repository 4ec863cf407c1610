#!/usr/bin/env node
/**
 * image-factory CLI
 * Build, verify and publish the image catalog, and keep its pinned dependencies current
 */

import { Command, InvalidArgumentError } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

import { createToolContext } from '@/app/context';
import { executeTool } from '@/app/execute';
import { createFactoryConfig, type ConfigOverrides } from '@/config/app-config';
import { createLogger } from '@/lib/logger';
import { ERROR_MESSAGES } from '@/lib/error-messages';
import { ALL_TOOLS } from '@/tools';
import bootstrapImageTool from '@/tools/bootstrap-image/tool';
import buildAllTool from '@/tools/build-all/tool';
import buildImageTool from '@/tools/build-image/tool';
import checkPinnedDepsTool, { summarizeReport } from '@/tools/check-pinned-deps/tool';
import checkScanResultsTool from '@/tools/check-scan-results/tool';
import checkUpstreamVersionsTool from '@/tools/check-upstream-versions/tool';
import createUpdatePrTool from '@/tools/create-update-pr/tool';
import formatReportTool from '@/tools/format-report/tool';
import generateMatrixTool from '@/tools/generate-matrix/tool';
import healthCheckTool from '@/tools/health-check/tool';
import notifyPushTool from '@/tools/notify-push/tool';
import type { ToolContext } from '@/types/context';
import { handleGenericError, handleResultError } from './error-formatting';
import { renderBuildAll, renderBuildReport, renderHealth, renderToolTable, renderUpdatePrOutcome } from './render';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  // dist/src/cli -> root when built, src/cli -> root from sources
  const candidates = [join(__dirname, '../../package.json'), join(__dirname, '../../../package.json')];
  const packageJsonPath = candidates.find((candidate) => existsSync(candidate));
  if (!packageJsonPath) return '0.0.0';

  const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

interface GlobalFlags {
  workspace?: string;
  logLevel?: string;
}

interface BuildFlags extends GlobalFlags {
  push?: boolean;
  scan?: boolean;
  platforms?: string;
  registry?: string;
  namespace?: string;
}

function out(lines: string | string[]): void {
  process.stdout.write(`${(typeof lines === 'string' ? [lines] : lines).join('\n')}\n`);
}

/**
 * Configuration and context for one command; null when the configuration is invalid
 */
function createContext(flags: BuildFlags): ToolContext | null {
  const overrides: ConfigOverrides = {};
  if (flags.workspace) overrides.workspaceDir = flags.workspace;
  if (flags.logLevel) overrides.logLevel = flags.logLevel;
  if (flags.registry) overrides.registry = flags.registry;
  if (flags.namespace) overrides.namespace = flags.namespace;
  if (flags.platforms) overrides.platforms = flags.platforms;
  if (flags.push !== undefined) overrides.push = flags.push;
  if (flags.scan !== undefined) overrides.scan = flags.scan;

  try {
    const config = createFactoryConfig(overrides);
    const logger = createLogger({ name: 'image-factory', level: config.logLevel });
    return createToolContext({ config, logger });
  } catch (error) {
    const issues =
      error instanceof z.ZodError
        ? error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')
        : String(error);
    handleGenericError(ERROR_MESSAGES.CONFIG_INVALID(issues));
    return null;
  }
}

function parseLevel(value: string): number {
  const level = Number.parseInt(value, 10);
  if (level !== 1 && level !== 2) {
    throw new InvalidArgumentError('Level must be 1 or 2.');
  }
  return level;
}

const addBuildOptions = (command: Command): Command =>
  command
    .option('--push', 'push to the registry (implies --scan)')
    .option('--scan', 'run pre-flight verification (Trivy and smoke test)')
    .option('--platforms <list>', 'comma separated target platforms')
    .option('--registry <host>', 'registry host')
    .option('--namespace <ns>', 'registry namespace');

export function createProgram(): Command {
  const program = new Command();

  program
    .name('image-factory')
    .description('Build, scan, sign and publish hardened multi-arch container images')
    .version(readVersion())
    .option('--workspace <dir>', 'repository root (default: current directory)')
    .option('--log-level <level>', 'logging level: trace, debug, info, warn, error, silent');

  addBuildOptions(program.command('build <image>').description('Build every variant of one image')).action(
    async (image: string, _options: BuildFlags, command: Command) => {
      const context = createContext(command.optsWithGlobals<BuildFlags>());
      if (!context) return;
      const result = await executeTool(buildImageTool, { image }, context);
      if (!result.ok) return handleResultError(result, `Build of ${image} failed`);
      out(renderBuildReport(result.value));
    },
  );

  addBuildOptions(program.command('build-all').description('Build every catalog image'))
    .option('--fail-fast', 'stop at the first failing image')
    .action(async (options: BuildFlags & { failFast?: boolean }, command: Command) => {
      const context = createContext(command.optsWithGlobals<BuildFlags>());
      if (!context) return;
      const result = await executeTool(buildAllTool, { failFast: options.failFast ?? false }, context);
      if (!result.ok) return handleResultError(result, 'Catalog build failed');
      out(renderBuildAll(result.value));
    });

  program
    .command('bootstrap <name>')
    .description('Build a single-arch bootstrap image and push it with publisher credentials')
    .option('--context <dir>', 'build context', '.')
    .option('--tag <tag>', 'image tag', 'latest')
    .option('--builder <name>', 'buildx builder name')
    .option('--endpoint <url>', 'remote builder endpoint, e.g. ssh://builder@buildhost')
    .option('--platform <platform>', 'target platform', 'linux/amd64')
    .option('--ca-cert <file>', 'registry CA certificate to trust before pushing')
    .action(async (name: string, options: Record<string, string | undefined>, command: Command) => {
      const context = createContext(command.optsWithGlobals<GlobalFlags>());
      if (!context) return;
      const result = await executeTool(
        bootstrapImageTool,
        {
          name,
          context: options.context,
          tag: options.tag,
          builder: options.builder,
          endpoint: options.endpoint,
          platform: options.platform,
          caCert: options.caCert,
        },
        context,
      );
      if (!result.ok) return handleResultError(result, `Bootstrap of ${name} failed`);
      out([`✅ ${result.value.image}`, `   ${result.value.digest}`]);
    });

  program
    .command('matrix')
    .description('Print the GitHub Actions build matrix as JSON')
    .option('--level <level>', '1: public bases, 2: internal bases', parseLevel)
    .action(async (options: { level?: number }, command: Command) => {
      const context = createContext(command.optsWithGlobals<GlobalFlags>());
      if (!context) return;
      const result = await executeTool(generateMatrixTool, { level: options.level }, context);
      if (!result.ok) return handleResultError(result, 'Matrix generation failed');
      out(JSON.stringify(result.value));
    });

  program
    .command('check-scan <results> <ignoreFile>')
    .description('Gate a Trivy JSON report against an ignore file')
    .action(async (resultsFile: string, ignoreFile: string, _options: unknown, command: Command) => {
      const context = createContext(command.optsWithGlobals<GlobalFlags>());
      if (!context) return;
      const result = await executeTool(checkScanResultsTool, { resultsFile, ignoreFile }, context);
      if (!result.ok) return handleResultError(result, 'Scan check failed');
      out(result.value.lines);
      if (!result.value.passed) process.exitCode = 1;
    });

  program
    .command('check-pinned')
    .description('Report pinned Docker digests and action SHAs with newer upstream values')
    .option('--root <dir>', 'directory to scan')
    .action(async (options: { root?: string }, command: Command) => {
      const context = createContext(command.optsWithGlobals<GlobalFlags>());
      if (!context) return;
      const result = await executeTool(checkPinnedDepsTool, { root: options.root }, context);
      if (!result.ok) return handleResultError(result, 'Dependency check failed');
      out(JSON.stringify(result.value.report, null, 2));
      console.error(`\n${summarizeReport(result.value.report)}`);
    });

  program
    .command('check-upstream')
    .description('Report newer upstream versions for variant files')
    .option('--config <file>', 'upstream config (JSON or YAML)')
    .action(async (options: { config?: string }, command: Command) => {
      const context = createContext(command.optsWithGlobals<GlobalFlags>());
      if (!context) return;
      const result = await executeTool(checkUpstreamVersionsTool, { config: options.config }, context);
      if (!result.ok) return handleResultError(result, 'Upstream check failed');
      out(JSON.stringify(result.value, null, 2));
    });

  program
    .command('update-pr <report>')
    .description('Apply a dependency report and open the update pull request')
    .action(async (reportFile: string, _options: unknown, command: Command) => {
      const context = createContext(command.optsWithGlobals<GlobalFlags>());
      if (!context) return;
      const result = await executeTool(createUpdatePrTool, { reportFile }, context);
      if (!result.ok) return handleResultError(result, 'Update pull request failed');
      console.error(renderUpdatePrOutcome(result.value));
    });

  program
    .command('format-report <report>')
    .description('Render a dependency report as Discord embed fields')
    .requiredOption('--type <type>', 'updates, warnings or success')
    .action(async (reportFile: string, options: { type: string }, command: Command) => {
      const context = createContext(command.optsWithGlobals<GlobalFlags>());
      if (!context) return;
      const result = await executeTool(formatReportTool, { reportFile, type: options.type }, context);
      if (!result.ok) return handleResultError(result, 'Report formatting failed');
      out(JSON.stringify(result.value));
    });

  program
    .command('notify-push <image> <tag> <digest>')
    .description('Announce a pushed image digest on Discord')
    .action(async (image: string, tag: string, digest: string, _options: unknown, command: Command) => {
      const context = createContext(command.optsWithGlobals<GlobalFlags>());
      if (!context) return;
      const result = await executeTool(notifyPushTool, { image, tag, digest }, context);
      if (!result.ok) return handleResultError(result, 'Notification failed');
      out(result.value.sent ? 'Notification sent' : `Skipping notification: ${result.value.reason ?? 'not sent'}`);
    });

  program
    .command('health-check')
    .description('Check the Docker daemon, buildx and the optional CLIs')
    .action(async (_options: unknown, command: Command) => {
      const context = createContext(command.optsWithGlobals<GlobalFlags>());
      if (!context) return;
      const result = await executeTool(healthCheckTool, {}, context);
      if (!result.ok) return handleResultError(result, 'Health check failed');
      out(renderHealth(result.value));
      if (!result.value.healthy) process.exitCode = 1;
    });

  program
    .command('list-tools')
    .description('List the available operations')
    .action(() => {
      out(renderToolTable(ALL_TOOLS));
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => handleGenericError('Command failed', error));
}
