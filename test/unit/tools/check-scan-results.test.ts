import { join } from 'node:path';

import { checkScanResults } from '@/tools/check-scan-results/tool';
import { createTestContext } from '../../__support__/utilities/fakes';
import { createTestTempDir, writeTree } from '../../__support__/utilities/tmp-helpers';

describe('check-scan-results', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    const temp = createTestTempDir('scan-results-');
    dir = temp.dir.name;
    cleanup = temp.cleanup;
  });

  afterEach(() => cleanup());

  const run = (resultsFile: string, ignoreFile: string) =>
    checkScanResults({ resultsFile, ignoreFile }, createTestContext({ workspaceDir: dir }));

  it('fails on unignored findings and lists stale ignores', async () => {
    writeTree(dir, {
      'results.json': JSON.stringify({
        Results: [
          {
            Target: 'app:1.0 (alpine 3.20)',
            Vulnerabilities: [
              { VulnerabilityID: 'CVE-2024-1000', PkgName: 'openssl', Title: 'Accepted issue' },
              { VulnerabilityID: 'CVE-2024-2000', PkgName: 'zlib', Title: 'Overflow' },
            ],
          },
        ],
      }),
      '.trivyignore': 'CVE-2024-1000 # accepted\nCVE-2020-0001\n',
    });
    const ignoreFile = join(dir, '.trivyignore');

    const result = await run(join(dir, 'results.json'), ignoreFile);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.passed).toBe(false);
    expect(result.value.ignoresLoaded).toBe(2);
    expect(result.value.lines).toEqual([
      `Loaded 2 ignores from ${ignoreFile}`,
      '',
      '[FAILURE] Unignored High/Critical findings detected:',
      '  [VULN] CVE-2024-2000 (zlib): Overflow',
      '',
      '[STALE IGNORES] The following ignores are no longer detected and can be removed:',
      '  - CVE-2020-0001',
    ]);
  });

  it('passes an empty report without an ignore file', async () => {
    writeTree(dir, { 'results.json': '{}' });
    const ignoreFile = join(dir, 'missing-ignore');

    const result = await run(join(dir, 'results.json'), ignoreFile);

    expect(result.ok && result.value.passed).toBe(true);
    expect(result.ok && result.value.lines).toEqual([
      `Loaded 0 ignores from ${ignoreFile}`,
      'No results found in scan (scan passed clean).',
      '',
      '[SUCCESS] No unignored vulnerabilities found.',
    ]);
  });

  it('fails on a report that is not JSON', async () => {
    writeTree(dir, { 'results.json': 'not json' });
    const result = await run(join(dir, 'results.json'), join(dir, 'missing-ignore'));

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error).toMatch(/^Error reading scan results: /);
  });

  it('fails on a missing report', async () => {
    const result = await run(join(dir, 'absent.json'), join(dir, 'missing-ignore'));
    expect(!result.ok && result.error).toMatch(/^Error reading scan results: ENOENT/);
  });

  it('fails on a report of the wrong shape', async () => {
    writeTree(dir, { 'results.json': '{"Results": 5}' });
    const resultsFile = join(dir, 'results.json');
    const result = await run(resultsFile, join(dir, 'missing-ignore'));

    expect(result).toMatchObject({
      ok: false,
      error: `Error reading scan results: unexpected report shape in ${resultsFile}`,
    });
  });
});
