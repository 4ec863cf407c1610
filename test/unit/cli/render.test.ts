import {
  renderBuildAll,
  renderBuildReport,
  renderHealth,
  renderToolTable,
  renderUpdatePrOutcome,
} from '@/cli/render';
import buildImageTool from '@/tools/build-image/tool';
import { ALL_TOOLS } from '@/tools';
import type { BuildImageReport } from '@/tools/build-image/tool';

const report: BuildImageReport = {
  image: 'app',
  repository: 'registry.local/docker-hosted/base/app',
  platforms: ['linux/amd64', 'linux/arm64'],
  versions: [
    {
      version: '1.0',
      tags: [],
      latest: false,
      verified: true,
      scanned: true,
      smokeTest: 'passed',
      pushed: true,
      signed: true,
      digest: 'sha256:d',
    },
    {
      version: '1.1',
      tags: [],
      latest: true,
      verified: true,
      scanned: false,
      smokeTest: 'none',
      pushed: false,
      signed: false,
    },
  ],
};

describe('renderBuildReport', () => {
  it('summarises every version', () => {
    expect(renderBuildReport(report)).toEqual([
      '📦 registry.local/docker-hosted/base/app (linux/amd64, linux/arm64)',
      '  ✅ 1.0: scanned, smoke test passed, pushed, signed',
      '     sha256:d',
      '  ✅ 1.1 (latest): scan skipped, no smoke test, dry run',
    ]);
  });
});

describe('renderBuildAll', () => {
  it('lists failures and the total', () => {
    const lines = renderBuildAll({
      outcomes: [
        { image: 'app', ok: true, report: { ...report, versions: [] } },
        { image: 'bad', ok: false, error: 'bad:1.0: Smoke test failed' },
      ],
      failed: ['bad'],
    });

    expect(lines).toEqual([
      '📦 registry.local/docker-hosted/base/app (linux/amd64, linux/arm64)',
      '❌ bad: bad:1.0: Smoke test failed',
      '',
      'Built 1 of 2 image(s)',
    ]);
  });
});

describe('renderHealth', () => {
  it('aligns names and marks missing tools', () => {
    expect(
      renderHealth({
        healthy: false,
        dependencies: [
          { name: 'docker', required: true, available: false, error: 'no daemon' },
          { name: 'gh', required: false, available: true, version: 'gh version 2.55.0' },
          { name: 'trivy', required: false, available: false },
        ],
      }),
    ).toEqual([
      '🏥 Health Check Results',
      '═'.repeat(40),
      '❌ docker  no daemon',
      '✅ gh      gh version 2.55.0',
      '⚠️  trivy   not available',
      '',
      'Status: unhealthy',
    ]);
  });
});

describe('renderUpdatePrOutcome', () => {
  it('describes each outcome', () => {
    expect(renderUpdatePrOutcome({ status: 'no-updates' })).toBe('No updates to apply');
    expect(renderUpdatePrOutcome({ status: 'no-changes', skippedFiles: [] })).toBe('No changes to commit.');
    expect(renderUpdatePrOutcome({ status: 'pr-exists', number: '12', skippedFiles: [] })).toBe(
      'PR #12 already exists.',
    );
    expect(renderUpdatePrOutcome({ status: 'pr-created', url: 'https://example.test/pr/1', skippedFiles: [] })).toBe(
      'Created PR: https://example.test/pr/1',
    );
  });
});

describe('renderToolTable', () => {
  it('draws one row per tool', () => {
    const lines = renderToolTable([buildImageTool]);

    expect(lines[1]).toBe('│ Name        │ Category │');
    expect(lines[3]).toBe('│ build-image │ build    │');
    expect(lines[lines.length - 1]).toBe('Total: 1 tools');
  });

  it('accepts the whole registry, whatever each tool takes and returns', () => {
    const lines = renderToolTable(ALL_TOOLS);

    expect(lines).toHaveLength(ALL_TOOLS.length + 6);
    expect(lines[lines.length - 1]).toBe(`Total: ${ALL_TOOLS.length} tools`);
  });

  it('handles an empty list', () => {
    expect(renderToolTable([])).toEqual(['No tools registered']);
  });
});
