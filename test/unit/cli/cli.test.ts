import { jest } from '@jest/globals';
import { join } from 'node:path';

import { createProgram } from '@/cli/cli';
import { ALL_TOOLS } from '@/tools';
import { createTestTempDir, writeTree } from '../../__support__/utilities/tmp-helpers';

describe('image-factory CLI', () => {
  let stdout: string;

  beforeEach(() => {
    stdout = '';
    jest.spyOn(process.stdout, 'write').mockImplementation((chunk: unknown) => {
      stdout += String(chunk);
      return true;
    });
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('registers one command per operation', () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual([
      'build',
      'build-all',
      'bootstrap',
      'matrix',
      'check-scan',
      'check-pinned',
      'check-upstream',
      'update-pr',
      'format-report',
      'notify-push',
      'health-check',
      'list-tools',
    ]);
  });

  it('lists the tools', async () => {
    await createProgram().parseAsync(['node', 'image-factory', 'list-tools']);

    expect(stdout).toContain('│ build-image ');
    expect(stdout.trimEnd().split('\n').pop()).toBe(`Total: ${ALL_TOOLS.length} tools`);
  });

  describe('with a workspace', () => {
    let workspace: string;
    let cleanup: () => void;

    beforeEach(() => {
      const temp = createTestTempDir('cli-');
      workspace = temp.dir.name;
      cleanup = temp.cleanup;
    });

    afterEach(() => cleanup());

    it('prints the matrix as JSON', async () => {
      writeTree(workspace, { 'images/app/Dockerfile': 'FROM alpine:3.20\n', 'images/app/VARIANTS': '1.0\n' });

      await createProgram().parseAsync([
        'node',
        'image-factory',
        '--workspace',
        workspace,
        '--log-level',
        'silent',
        'matrix',
        '--level',
        '1',
      ]);

      expect(stdout).toBe('{"include":[{"image":"app","version":"1.0"}]}\n');
      expect(process.exitCode).toBeUndefined();
    });

    it('fails the process when the scan gate finds something', async () => {
      writeTree(workspace, {
        'results.json': JSON.stringify({
          Results: [{ Target: 'app', Vulnerabilities: [{ VulnerabilityID: 'CVE-2024-2000', PkgName: 'zlib', Title: 'Overflow' }] }],
        }),
      });

      await createProgram().parseAsync([
        'node',
        'image-factory',
        '--log-level',
        'silent',
        'check-scan',
        join(workspace, 'results.json'),
        join(workspace, 'missing-ignore'),
      ]);

      expect(stdout).toContain('  [VULN] CVE-2024-2000 (zlib): Overflow\n');
      expect(process.exitCode).toBe(1);
    });
  });
});
