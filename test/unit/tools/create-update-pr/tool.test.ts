import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { createUpdatePr, groupByFile } from '@/tools/create-update-pr/tool';
import type { DependencyUpdate } from '@/tools/shared/dependency-report';
import { createTestContext, FakeRunner } from '../../../__support__/utilities/fakes';
import { createTestTempDir, writeTree } from '../../../__support__/utilities/tmp-helpers';

const SHA_C = 'c'.repeat(40);
const PR_URL = 'https://github.example.test/owner/repo/pull/9';

const pythonUpdate: DependencyUpdate = {
  type: 'docker_unpinned',
  file: 'images/app/Dockerfile',
  image: 'python',
  tag: '3.12-slim',
  current_digest: null,
  latest_digest: 'sha256:new1',
  raw_ref: 'python:3.12-slim',
};

const updates: DependencyUpdate[] = [
  pythonUpdate,
  {
    type: 'action_unpinned',
    file: '.github/workflows/ci.yml',
    action: 'docker/setup-buildx-action',
    tag: 'v3',
    current_sha: null,
    latest_sha: SHA_C,
    raw_ref: 'docker/setup-buildx-action@v3',
  },
  {
    type: 'docker_digest',
    file: 'images/gone/Dockerfile',
    image: 'alpine',
    tag: '3.20',
    current_digest: 'sha256:old',
    latest_digest: 'sha256:new',
    raw_ref: 'alpine:3.20@sha256:old',
  },
];

describe('groupByFile', () => {
  it('groups in first-seen order', () => {
    const groups = groupByFile([...updates, { ...pythonUpdate, raw_ref: 'python:3.13-slim' }]);
    expect([...groups.keys()]).toEqual(['images/app/Dockerfile', '.github/workflows/ci.yml', 'images/gone/Dockerfile']);
    expect(groups.get('images/app/Dockerfile')).toHaveLength(2);
  });
});

describe('create-update-pr', () => {
  let workspace: string;
  let cleanup: () => void;

  beforeEach(() => {
    const temp = createTestTempDir('update-pr-');
    workspace = temp.dir.name;
    cleanup = temp.cleanup;
    writeTree(workspace, {
      'report.json': JSON.stringify({ updates, warnings: [], up_to_date: [] }),
      'images/app/Dockerfile': 'FROM python:3.12-slim\n',
      '.github/workflows/ci.yml': '      - uses: docker/setup-buildx-action@v3\n',
    });
  });

  afterEach(() => cleanup());

  const run = (runner: FakeRunner) =>
    createUpdatePr({ reportFile: 'report.json' }, createTestContext({ workspaceDir: workspace, runner }));

  it('rewrites the files, pushes the branch and opens a pull request', async () => {
    const runner = new FakeRunner()
      .onRun('git diff --cached --quiet', { exitCode: 1 })
      .onRun('gh pr create', { stdout: `${PR_URL}\n` });

    const result = await run(runner);

    expect(result).toEqual({
      ok: true,
      value: { status: 'pr-created', url: PR_URL, skippedFiles: ['images/gone/Dockerfile'] },
    });
    expect(readFileSync(join(workspace, 'images/app/Dockerfile'), 'utf8')).toBe('FROM python:3.12-slim@sha256:new1\n');
    expect(readFileSync(join(workspace, '.github/workflows/ci.yml'), 'utf8')).toBe(
      `      - uses: docker/setup-buildx-action@${SHA_C} # v3\n`,
    );

    const lines = runner.lines('run');
    expect(lines.slice(0, 10)).toEqual([
      'git config user.name github-actions[bot]',
      'git config user.email 41898282+github-actions[bot]@users.noreply.github.com',
      'git fetch origin main',
      'git checkout -B auto-update/pinned-deps origin/main',
      'git add images/app/Dockerfile',
      'git add .github/workflows/ci.yml',
      'git diff --cached --quiet',
      'git commit -m update: pinned dependency digests/SHAs',
      'git push --force origin auto-update/pinned-deps',
      'gh pr list --head auto-update/pinned-deps --state open --json number -q .[0].number',
    ]);
    expect(lines[10]?.startsWith('gh pr create --title update: pinned dependency digests/SHAs --body ## Summary')).toBe(
      true,
    );
    expect(runner.calls[10]?.args.slice(-4)).toEqual(['--head', 'auto-update/pinned-deps', '--base', 'main']);
  });

  it('runs git inside the workspace', async () => {
    const runner = new FakeRunner();
    await run(runner);
    expect(runner.calls[0]?.options).toEqual({ cwd: workspace });
  });

  it('leaves an open pull request to pick up the push', async () => {
    const runner = new FakeRunner()
      .onRun('git diff --cached --quiet', { exitCode: 1 })
      .onRun('gh pr list', { stdout: '12\n' });

    const result = await run(runner);

    expect(result).toEqual({
      ok: true,
      value: { status: 'pr-exists', number: '12', skippedFiles: ['images/gone/Dockerfile'] },
    });
    expect(runner.lines('run').some((line) => line.startsWith('gh pr create'))).toBe(false);
  });

  it('stops without committing when nothing changed', async () => {
    const runner = new FakeRunner();
    const result = await run(runner);

    expect(result).toEqual({ ok: true, value: { status: 'no-changes', skippedFiles: ['images/gone/Dockerfile'] } });
    expect(runner.lines('run').some((line) => line.startsWith('git commit'))).toBe(false);
  });

  it('does nothing for an empty report', async () => {
    writeTree(workspace, { 'report.json': JSON.stringify({ updates: [] }) });
    const runner = new FakeRunner();

    const result = await run(runner);

    expect(result).toEqual({ ok: true, value: { status: 'no-updates' } });
    expect(runner.calls).toEqual([]);
  });

  it('rejects a report of the wrong shape', async () => {
    writeTree(workspace, { 'report.json': JSON.stringify({ updates: [{ type: 'bogus' }] }) });
    const result = await run(new FakeRunner());
    expect(result).toMatchObject({ ok: false, error: 'Report report.json is not a dependency report' });
  });

  it('fails when a git step fails', async () => {
    const runner = new FakeRunner().onRun('git fetch', { exitCode: 128, stderr: 'fatal: no remote\n' });
    const result = await run(runner);
    expect(result).toEqual({ ok: false, error: 'Git command failed: git fetch origin main\nfatal: no remote' });
  });
});
