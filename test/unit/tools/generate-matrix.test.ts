import { generateMatrix } from '@/tools/generate-matrix/tool';
import { createTestContext } from '../../__support__/utilities/fakes';
import { createTestTempDir, writeTree } from '../../__support__/utilities/tmp-helpers';

describe('generate-matrix', () => {
  let workspace: string;
  let cleanup: () => void;

  beforeEach(() => {
    const temp = createTestTempDir('matrix-');
    workspace = temp.dir.name;
    cleanup = temp.cleanup;
    writeTree(workspace, {
      'images/b-app/Dockerfile': 'FROM registry.local/docker-hosted/base/a-base:1.9\n',
      'images/b-app/VERSION': '2\n',
      'images/a-base/Dockerfile': 'FROM alpine:3.20\n',
      'images/a-base/VARIANTS': '1.0 1.10\n1.9\n',
      'images/c-nofile/Dockerfile': 'FROM alpine:3.20\n',
    });
  });

  afterEach(() => cleanup());

  it('lists every image and version sorted by code point', async () => {
    const result = await generateMatrix({}, createTestContext({ workspaceDir: workspace }));

    expect(result).toEqual({
      ok: true,
      value: {
        include: [
          { image: 'a-base', version: '1.0' },
          { image: 'a-base', version: '1.10' },
          { image: 'a-base', version: '1.9' },
          { image: 'b-app', version: '2' },
        ],
      },
    });
  });

  it('keeps only images built on public bases for level 1', async () => {
    const result = await generateMatrix({ level: 1 }, createTestContext({ workspaceDir: workspace }));
    expect(result.ok && result.value.include.map((entry) => entry.image)).toEqual(['a-base', 'a-base', 'a-base']);
  });

  it('keeps only images built on internal images for level 2', async () => {
    const result = await generateMatrix({ level: 2 }, createTestContext({ workspaceDir: workspace }));
    expect(result.ok && result.value.include).toEqual([{ image: 'b-app', version: '2' }]);
  });

  it('follows a different registry host for the level split', async () => {
    const result = await generateMatrix(
      { level: 2 },
      createTestContext({ workspaceDir: workspace, overrides: { registry: 'other.example.test' } }),
    );
    expect(result.ok && result.value.include).toEqual([]);
  });

  it('fails when the images directory is missing', async () => {
    const empty = createTestTempDir('matrix-empty-');
    try {
      const result = await generateMatrix({}, createTestContext({ workspaceDir: empty.dir.name }));
      expect(result).toMatchObject({ ok: false, error: `Error: ${empty.dir.name}/images not found` });
    } finally {
      empty.cleanup();
    }
  });
});
