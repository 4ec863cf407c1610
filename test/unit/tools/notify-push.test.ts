import { notifyPush } from '@/tools/notify-push/tool';
import { createFakeFetch, createTestContext } from '../../__support__/utilities/fakes';

const WEBHOOK = 'https://discord.example.test/api/webhooks/1/test-token';
const params = { image: 'registry.local/docker-hosted/base/app', tag: '1.0', digest: 'sha256:abc' };

describe('notify-push', () => {
  it('skips without a webhook', async () => {
    const { fetch, calls } = createFakeFetch();
    const result = await notifyPush(params, createTestContext({ workspaceDir: '/workspace', fetch }));

    expect(result).toEqual({ ok: true, value: { sent: false, reason: 'DISCORD_WEBHOOK not set' } });
    expect(calls).toHaveLength(0);
  });

  it('skips a malformed webhook without calling it', async () => {
    const { fetch, calls } = createFakeFetch();
    const result = await notifyPush(
      params,
      createTestContext({ workspaceDir: '/workspace', fetch, env: { DISCORD_WEBHOOK: 'not a url' } }),
    );

    expect(result).toEqual({ ok: true, value: { sent: false, reason: 'DISCORD_WEBHOOK is not a valid URL' } });
    expect(calls).toHaveLength(0);
  });

  it('posts the message to the webhook', async () => {
    const { fetch, calls } = createFakeFetch(204);
    const result = await notifyPush(
      params,
      createTestContext({ workspaceDir: '/workspace', fetch, env: { DISCORD_WEBHOOK: WEBHOOK } }),
    );

    expect(result).toEqual({ ok: true, value: { sent: true } });
    expect(calls[0]?.url).toBe(WEBHOOK);
    expect(calls[0]?.init?.method).toBe('POST');
  });

  it('reports a rejected delivery without failing', async () => {
    const { fetch } = createFakeFetch(500, 'Internal Server Error');
    const result = await notifyPush(
      params,
      createTestContext({ workspaceDir: '/workspace', fetch, env: { DISCORD_WEBHOOK: WEBHOOK } }),
    );

    expect(result).toEqual({ ok: true, value: { sent: false, reason: '500 Internal Server Error' } });
  });
});
