/**
 * Tests for the docker buildx wrapper
 */

import { buildxBuildArgs, createBuildxClient } from '@/infra/docker/buildx';
import { createSilentLogger, FakeRunner } from '../../../__support__/utilities/fakes';

describe('buildxBuildArgs', () => {
  it('builds a multi-arch push with SBOM attestation', () => {
    expect(
      buildxBuildArgs({
        context: 'images/app',
        dockerfile: 'images/app/Dockerfile',
        platforms: ['linux/amd64', 'linux/arm64'],
        tags: ['registry.local/ns/base/app:1.0', 'registry.local/ns/base/app:latest'],
        buildArgs: { VERSION: '1.0' },
        push: true,
      }),
    ).toEqual([
      'buildx',
      'build',
      '--platform',
      'linux/amd64,linux/arm64',
      '--build-arg',
      'VERSION=1.0',
      '--tag',
      'registry.local/ns/base/app:1.0',
      '--tag',
      'registry.local/ns/base/app:latest',
      '--file',
      'images/app/Dockerfile',
      '--push',
      '--sbom=true',
      'images/app',
    ]);
  });

  it('loads a single-platform build without pushing', () => {
    expect(buildxBuildArgs({ context: '.', platforms: ['linux/amd64'], tags: ['local-scan-app:1'], load: true })).toEqual([
      'buildx',
      'build',
      '--load',
      '--platform',
      'linux/amd64',
      '--tag',
      'local-scan-app:1',
      '.',
    ]);
  });
});

describe('createBuildxClient', () => {
  const logger = createSilentLogger();

  it('detects the plugin and builders by exit code', async () => {
    const runner = new FakeRunner().onRun('docker buildx inspect missing', { exitCode: 1 });
    const buildx = createBuildxClient(runner, logger);

    await expect(buildx.isInstalled()).resolves.toBe(true);
    await expect(buildx.builderExists('factory-builder')).resolves.toBe(true);
    await expect(buildx.builderExists('missing')).resolves.toBe(false);
  });

  it('lists builder names and ignores node rows', async () => {
    const runner = new FakeRunner().onRun('docker buildx ls', {
      stdout: [
        'NAME/NODE           DRIVER/ENDPOINT             STATUS   BUILDKIT  PLATFORMS',
        'factory-builder*    docker-container',
        ' \\_ factory-builder0 \\_ unix:///var/run/docker.sock running v0.13.2 linux/amd64',
        'default             docker',
        '  default           default                     running  v0.12.5  linux/amd64',
        '',
      ].join('\n'),
    });

    const result = await createBuildxClient(runner, logger).listBuilders();
    expect(result).toEqual({ ok: true, value: ['factory-builder', 'default'] });
  });

  it('reads the older layout where the default marker is its own column', async () => {
    const runner = new FakeRunner().onRun('docker buildx ls', {
      stdout: [
        'NAME/NODE          DRIVER/ENDPOINT                STATUS  BUILDKIT PLATFORMS',
        'remote-builder *   docker-container',
        '  remote-builder0  ssh://builder@buildhost        running v0.12.5  linux/amd64, linux/amd64/v2, linux/386',
        '  remote-builder1  unix:///var/run/docker.sock    running v0.12.5  linux/arm64',
        'default            docker',
        '  default          default                        running 24.0.7   linux/amd64',
        '',
      ].join('\n'),
    });

    const result = await createBuildxClient(runner, logger).listBuilders();
    expect(result).toEqual({ ok: true, value: ['remote-builder', 'default'] });
  });

  it('creates a remote builder with every option', async () => {
    const runner = new FakeRunner();
    await createBuildxClient(runner, logger).createBuilder({
      name: 'remote',
      platform: 'linux/amd64',
      use: true,
      endpoint: 'ssh://builder@buildhost',
    });

    expect(runner.lines('stream')).toEqual([
      'docker buildx create --name remote --driver docker-container --platform linux/amd64 --use ssh://builder@buildhost',
    ]);
  });

  it('fails a build that exits non-zero', async () => {
    const runner = new FakeRunner().onStream('docker buildx build', 1);
    const result = await createBuildxClient(runner, logger).build({
      context: '.',
      platforms: ['linux/amd64'],
      tags: ['app:1'],
    });

    expect(result).toMatchObject({ ok: false, error: 'Build of app:1 failed with exit code 1' });
  });

  describe('manifestDigest', () => {
    const reference = 'registry.local/ns/base/app:1.0';

    it('reads the digest from the manifest JSON', async () => {
      const runner = new FakeRunner().onRun('docker buildx imagetools inspect', {
        stdout: '{"schemaVersion":2,"mediaType":"application/vnd.oci.image.index.v1+json","digest":"sha256:0123abcd"}',
      });
      const result = await createBuildxClient(runner, logger).manifestDigest(reference);

      expect(result).toEqual({ ok: true, value: 'sha256:0123abcd' });
      expect(runner.calls[0]?.args).toEqual([
        'buildx',
        'imagetools',
        'inspect',
        reference,
        '--format',
        '{{json .Manifest}}',
      ]);
    });

    it('fails on output that is not JSON', async () => {
      const runner = new FakeRunner().onRun('docker buildx imagetools inspect', { stdout: 'Name: app' });
      const result = await createBuildxClient(runner, logger).manifestDigest(reference);
      expect(result).toMatchObject({ ok: false, error: `Unexpected imagetools output for ${reference}` });
    });

    it('fails when the reference cannot be inspected', async () => {
      const runner = new FakeRunner().onRun('docker buildx imagetools inspect', {
        exitCode: 1,
        stderr: 'not found\n',
      });
      const result = await createBuildxClient(runner, logger).manifestDigest(reference);
      expect(result).toMatchObject({ ok: false, error: `Could not inspect ${reference}: not found` });
    });
  });
});
