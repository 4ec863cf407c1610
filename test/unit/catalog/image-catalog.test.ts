/**
 * Tests for the image catalog read from the images directory
 */

import { join } from 'node:path';

import {
  buildLevel,
  imagesRoot,
  listImageNames,
  loadVariants,
  parseVariants,
  resolveImage,
} from '@/catalog/image-catalog';
import { createFactoryConfig, type FactoryConfig } from '@/config/app-config';
import { createTestTempDir, writeTree } from '../../__support__/utilities/tmp-helpers';

describe('image-catalog', () => {
  let workspace: string;
  let cleanup: () => void;
  let config: FactoryConfig;

  beforeEach(() => {
    const temp = createTestTempDir('catalog-');
    workspace = temp.dir.name;
    cleanup = temp.cleanup;
    config = createFactoryConfig({ workspaceDir: workspace }, {});

    writeTree(workspace, {
      'images/python-distroless/Dockerfile': 'ARG VERSION\nFROM python:3.12-slim AS build\n',
      'images/python-distroless/VARIANTS': '3.11\n3.12\n',
      'images/app-runtime/Dockerfile': 'FROM registry.local/docker-hosted/base/python-distroless:3.12\n',
      'images/app-runtime/VERSION': '1.0.0\n',
      'images/broken/Dockerfile': 'FROM alpine:3.20\n',
      'images/empty/VARIANTS': '\n\n',
      'images/README.md': '# Images\n',
    });
  });

  afterEach(() => cleanup());

  describe('parseVariants', () => {
    it('splits on any whitespace', () => {
      expect(parseVariants('3.11\n 3.12  \n\n3.13')).toEqual(['3.11', '3.12', '3.13']);
      expect(parseVariants('  \n')).toEqual([]);
    });
  });

  describe('listImageNames', () => {
    it('lists image directories sorted', async () => {
      await expect(listImageNames(imagesRoot(config))).resolves.toEqual({
        ok: true,
        value: ['app-runtime', 'broken', 'empty', 'python-distroless'],
      });
    });

    it('fails when the directory is missing', async () => {
      const missing = join(workspace, 'nope');
      await expect(listImageNames(missing)).resolves.toMatchObject({ ok: false, error: `Error: ${missing} not found` });
    });
  });

  describe('loadVariants', () => {
    it('falls back to VERSION', async () => {
      await expect(loadVariants(join(workspace, 'images/app-runtime'), 'app-runtime')).resolves.toEqual({
        ok: true,
        value: ['1.0.0'],
      });
    });

    it('fails without a variant file', async () => {
      await expect(loadVariants(join(workspace, 'images/broken'), 'broken')).resolves.toMatchObject({
        ok: false,
        error: 'No VARIANTS or VERSION file found for broken',
      });
    });
  });

  describe('buildLevel', () => {
    it('is 2 only for bases from the internal registry', () => {
      expect(buildLevel('registry.local/docker-hosted/base/app:1', 'registry.local')).toBe(2);
      expect(buildLevel('python:3.12', 'registry.local')).toBe(1);
      expect(buildLevel(undefined, 'registry.local')).toBe(1);
    });
  });

  describe('resolveImage', () => {
    it('resolves versions, latest variant, base image and repository', async () => {
      const result = await resolveImage(config, 'python-distroless');

      expect(result).toEqual({
        ok: true,
        value: {
          name: 'python-distroless',
          dir: join(workspace, 'images', 'python-distroless'),
          dockerfile: join(workspace, 'images', 'python-distroless', 'Dockerfile'),
          versions: ['3.11', '3.12'],
          latestVersion: '3.12',
          baseImage: 'python:3.12-slim',
          level: 1,
          repository: 'registry.local/docker-hosted/base/python-distroless',
        },
      });
    });

    it('places images built on internal bases at level 2', async () => {
      const result = await resolveImage(config, 'app-runtime');
      expect(result.ok && result.value.level).toBe(2);
    });

    it('fails for an unknown image', async () => {
      await expect(resolveImage(config, 'missing')).resolves.toMatchObject({ ok: false, error: 'Image missing not found' });
    });

    it('fails for an image without variants', async () => {
      await expect(resolveImage(config, 'empty')).resolves.toMatchObject({
        ok: false,
        error: 'No versions listed for empty',
      });
    });
  });
});
