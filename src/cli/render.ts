/**
 * Shared CLI rendering utilities for consistent output formatting.
 * Renderers return lines; the commands decide which stream they go to.
 */

import type { ToolSummary } from '@/types/tool';
import type { BuildAllResult } from '@/tools/build-all/tool';
import type { BuildImageReport } from '@/tools/build-image/tool';
import type { CreateUpdatePrOutcome } from '@/tools/create-update-pr/tool';
import type { HealthCheckResult } from '@/tools/health-check/tool';

export function renderBuildReport(report: BuildImageReport): string[] {
  const lines = [`📦 ${report.repository} (${report.platforms.join(', ')})`];

  for (const version of report.versions) {
    const steps: string[] = [];
    if (version.verified) {
      steps.push(version.scanned ? 'scanned' : 'scan skipped');
      steps.push(version.smokeTest === 'passed' ? 'smoke test passed' : 'no smoke test');
    }
    steps.push(version.pushed ? 'pushed' : 'dry run');
    if (version.signed) steps.push('signed');

    lines.push(`  ✅ ${version.version}${version.latest ? ' (latest)' : ''}: ${steps.join(', ')}`);
    if (version.digest) {
      lines.push(`     ${version.digest}`);
    }
  }
  return lines;
}

export function renderBuildAll(result: BuildAllResult): string[] {
  const lines: string[] = [];
  for (const outcome of result.outcomes) {
    if (outcome.ok) {
      lines.push(...renderBuildReport(outcome.report));
    } else {
      lines.push(`❌ ${outcome.image}: ${outcome.error}`);
    }
  }
  const built = result.outcomes.length - result.failed.length;
  lines.push('', `Built ${built} of ${result.outcomes.length} image(s)`);
  return lines;
}

export function renderHealth(result: HealthCheckResult): string[] {
  const width = Math.max(...result.dependencies.map((dependency) => dependency.name.length));
  const lines = ['🏥 Health Check Results', '═'.repeat(40)];

  for (const dependency of result.dependencies) {
    const icon = dependency.available ? '✅' : dependency.required ? '❌' : '⚠️ ';
    const detail = dependency.available ? (dependency.version ?? 'available') : (dependency.error ?? 'not available');
    lines.push(`${icon} ${dependency.name.padEnd(width)}  ${detail}`);
  }

  lines.push('', `Status: ${result.healthy ? 'healthy' : 'unhealthy'}`);
  return lines;
}

export function renderUpdatePrOutcome(outcome: CreateUpdatePrOutcome): string {
  switch (outcome.status) {
    case 'no-updates':
      return 'No updates to apply';
    case 'no-changes':
      return 'No changes to commit.';
    case 'pr-exists':
      return `PR #${outcome.number} already exists.`;
    case 'pr-created':
      return `Created PR: ${outcome.url}`;
  }
}

/**
 * Tools in table format
 */
export function renderToolTable(tools: readonly ToolSummary[]): string[] {
  if (tools.length === 0) {
    return ['No tools registered'];
  }

  const nameWidth = Math.max(4, ...tools.map((t) => t.name.length));
  const categoryWidth = Math.max(8, ...tools.map((t) => t.category.length));

  const lines = [
    `┌─${'─'.repeat(nameWidth)}─┬─${'─'.repeat(categoryWidth)}─┐`,
    `│ ${'Name'.padEnd(nameWidth)} │ ${'Category'.padEnd(categoryWidth)} │`,
    `├─${'─'.repeat(nameWidth)}─┼─${'─'.repeat(categoryWidth)}─┤`,
  ];
  for (const tool of tools) {
    lines.push(`│ ${tool.name.padEnd(nameWidth)} │ ${tool.category.padEnd(categoryWidth)} │`);
  }
  lines.push(`└─${'─'.repeat(nameWidth)}─┴─${'─'.repeat(categoryWidth)}─┘`, '', `Total: ${tools.length} tools`);
  return lines;
}
