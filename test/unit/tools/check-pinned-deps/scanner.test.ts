import { actionDependencies, dockerDependencies } from '@/tools/check-pinned-deps/scanner';

const SHA_A = 'a'.repeat(40);
const SHA_B = 'b'.repeat(40);

describe('dockerDependencies', () => {
  it('skips scratch and earlier stages, case-insensitively', () => {
    const content = [
      'ARG PY=3.12',
      'FROM python:${PY}-slim AS builder',
      'FROM builder AS test',
      'FROM --platform=$BUILDPLATFORM node:20 AS web',
      'FROM scratch',
      'FROM gcr.io/distroless/base@sha256:aaa',
      'FROM Builder',
    ].join('\n');

    expect(dockerDependencies(content, 'images/app/Dockerfile')).toEqual([
      {
        type: 'docker_unpinned',
        file: 'images/app/Dockerfile',
        image: 'python',
        tag: '3.12-slim',
        current_digest: null,
        raw_ref: 'python:${PY}-slim',
      },
      {
        type: 'docker_unpinned',
        file: 'images/app/Dockerfile',
        image: 'node',
        tag: '20',
        current_digest: null,
        raw_ref: 'node:20',
      },
      {
        type: 'docker_digest',
        file: 'images/app/Dockerfile',
        image: 'gcr.io/distroless/base',
        tag: 'latest',
        current_digest: 'sha256:aaa',
        raw_ref: 'gcr.io/distroless/base@sha256:aaa',
      },
    ]);
  });

  it('reads a FROM reference continued onto the next line', () => {
    const content = [
      'ARG GO=1.22',
      'FROM --platform=$BUILDPLATFORM \\',
      '    registry.local/docker-hosted/base/go:${GO} AS build',
      'FROM scratch',
    ].join('\n');

    expect(dockerDependencies(content, 'images/tool/Dockerfile')).toEqual([
      {
        type: 'docker_unpinned',
        file: 'images/tool/Dockerfile',
        image: 'registry.local/docker-hosted/base/go',
        tag: '1.22',
        current_digest: null,
        raw_ref: 'registry.local/docker-hosted/base/go:${GO}',
      },
    ]);
  });

  it('keeps the tag of a tagged digest reference', () => {
    expect(dockerDependencies('FROM alpine:3.20@sha256:bbb\n', 'Dockerfile')).toEqual([
      {
        type: 'docker_digest',
        file: 'Dockerfile',
        image: 'alpine',
        tag: '3.20',
        current_digest: 'sha256:bbb',
        raw_ref: 'alpine:3.20@sha256:bbb',
      },
    ]);
  });
});

describe('actionDependencies', () => {
  it('classifies pinned, untagged and unpinned actions', () => {
    const workflow = [
      'jobs:',
      '  build:',
      '    steps:',
      `      - uses: actions/checkout@${SHA_A} # v4.1.7`,
      '      - uses: ./local-action@v1',
      '      - uses: docker/setup-buildx-action@v3',
      `      - uses: github/codeql-action/init@${SHA_B}`,
      '      - name: cache',
      '        uses: actions/cache@v4.0.2',
    ].join('\n');

    expect(actionDependencies(workflow, 'ci.yml')).toEqual([
      {
        type: 'action_pinned',
        file: 'ci.yml',
        action: 'actions/checkout',
        tag: 'v4.1.7',
        current_sha: SHA_A,
        raw_ref: `actions/checkout@${SHA_A}`,
      },
      {
        type: 'action_unpinned',
        file: 'ci.yml',
        action: 'docker/setup-buildx-action',
        tag: 'v3',
        current_sha: null,
        raw_ref: 'docker/setup-buildx-action@v3',
      },
      {
        type: 'action_no_tag',
        file: 'ci.yml',
        action: 'github/codeql-action/init',
        current_sha: SHA_B,
        raw_ref: `github/codeql-action/init@${SHA_B}`,
      },
      {
        type: 'action_unpinned',
        file: 'ci.yml',
        action: 'actions/cache',
        tag: 'v4.0.2',
        current_sha: null,
        raw_ref: 'actions/cache@v4.0.2',
      },
    ]);
  });

  it('does not treat a short hex ref as a pin', () => {
    expect(actionDependencies('- uses: owner/action@abc1234', 'ci.yml')[0]?.type).toBe('action_unpinned');
  });
});
