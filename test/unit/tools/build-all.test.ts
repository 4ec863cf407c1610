import buildAllTool, { buildAll } from '@/tools/build-all/tool';
import { createTestContext, FakeRunner } from '../../__support__/utilities/fakes';
import { createTestTempDir, writeTree } from '../../__support__/utilities/tmp-helpers';

describe('build-all', () => {
  let workspace: string;
  let cleanup: () => void;

  beforeEach(() => {
    const temp = createTestTempDir('build-all-');
    workspace = temp.dir.name;
    cleanup = temp.cleanup;
    writeTree(workspace, {
      'images/app/Dockerfile': 'FROM alpine:3.20\n',
      'images/app/VARIANTS': '1.0\n',
      'images/bad/Dockerfile': 'FROM alpine:3.20\n',
      'images/bad/VARIANTS': '9.9\n',
      'images/zzz/Dockerfile': 'FROM alpine:3.20\n',
    });
  });

  afterEach(() => cleanup());

  const failingBuild = (): FakeRunner =>
    new FakeRunner().onStream('docker buildx build --platform linux/amd64,linux/arm64 --build-arg VERSION=9.9', 1);

  it('is registered as a build tool', () => {
    expect(buildAllTool.name).toBe('build-all');
  });

  it('keeps going past failures and reports every failed image', async () => {
    const runner = failingBuild();
    const result = await buildAll({ failFast: false }, createTestContext({ workspaceDir: workspace, runner }));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBe('2 of 3 image(s) failed: bad, zzz');
    expect(result.guidance?.details?.summary).toMatchObject({
      failed: ['bad', 'zzz'],
      outcomes: [
        { image: 'app', ok: true },
        { image: 'bad', ok: false },
        { image: 'zzz', ok: false, error: 'No VARIANTS or VERSION file found for zzz' },
      ],
    });
  });

  it('checks the builder only once per run', async () => {
    const runner = failingBuild();
    await buildAll({ failFast: false }, createTestContext({ workspaceDir: workspace, runner }));
    expect(runner.lines('run').filter((line) => line === 'docker buildx version')).toHaveLength(1);
  });

  it('stops at the first failure with failFast', async () => {
    const runner = failingBuild();
    const result = await buildAll({ failFast: true }, createTestContext({ workspaceDir: workspace, runner }));
    expect(result).toMatchObject({ ok: false, error: '1 of 2 image(s) failed: bad' });
  });

  it('succeeds when every image builds', async () => {
    writeTree(workspace, { 'images/zzz/VARIANTS': '0.1\n' });
    const result = await buildAll({ failFast: false }, createTestContext({ workspaceDir: workspace }));

    expect(result.ok).toBe(true);
    expect(result.ok && result.value.failed).toEqual([]);
    expect(result.ok && result.value.outcomes.map((outcome) => outcome.image)).toEqual(['app', 'bad', 'zzz']);
  });

  it('fails before building when buildx is missing', async () => {
    const runner = new FakeRunner().onRun('docker buildx version', { exitCode: 1 });
    const result = await buildAll({ failFast: false }, createTestContext({ workspaceDir: workspace, runner }));

    expect(result).toMatchObject({ ok: false });
    expect(runner.lines('stream')).toEqual([]);
  });
});
