/**
 * Tests for the Discord webhook notifier
 */

import { createDiscordNotifier, formatPushMessage } from '@/infra/notify/discord';
import type { FetchFn } from '@/types/context';
import { createFakeFetch, createSilentLogger } from '../../../__support__/utilities/fakes';

const logger = createSilentLogger();
const WEBHOOK = 'https://discord.example.test/api/webhooks/1/test-token';

describe('formatPushMessage', () => {
  it('renders the announcement', () => {
    expect(formatPushMessage({ image: 'registry.local/ns/base/app', tag: '1.0', digest: 'sha256:abc' })).toEqual({
      username: 'Image Factory',
      content: [
        '**New Image Pushed**',
        '**Image:** `registry.local/ns/base/app`',
        '**Tag:** `1.0`',
        '**Digest:** `sha256:abc`',
        '',
        'Update your manifests to use this secure pinning!',
      ].join('\n'),
    });
  });
});

describe('createDiscordNotifier', () => {
  const message = { username: 'Image Factory', content: 'hello' };

  it('posts the message as JSON', async () => {
    const { fetch, calls } = createFakeFetch(204);
    const outcome = await createDiscordNotifier(WEBHOOK, fetch, logger).send(message);

    expect(outcome).toEqual({ delivered: true, status: 204 });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe(WEBHOOK);
    expect(calls[0]?.init?.method).toBe('POST');
    expect(calls[0]?.init?.headers).toEqual({
      'Content-Type': 'application/json',
      'User-Agent': 'Image-Factory-Notifier',
    });
    expect(calls[0]?.init?.body).toBe(JSON.stringify(message));
  });

  it('reports a rejected delivery', async () => {
    const { fetch } = createFakeFetch(500, 'Internal Server Error');
    await expect(createDiscordNotifier(WEBHOOK, fetch, logger).send(message)).resolves.toEqual({
      delivered: false,
      status: 500,
      error: '500 Internal Server Error',
    });
  });

  it('reports a network error without throwing', async () => {
    const failingFetch: FetchFn = async () => {
      throw new Error('getaddrinfo ENOTFOUND discord.example.test');
    };
    await expect(createDiscordNotifier(WEBHOOK, failingFetch, logger).send(message)).resolves.toEqual({
      delivered: false,
      error: 'getaddrinfo ENOTFOUND discord.example.test',
    });
  });
});
