/**
 * Discord webhook notifier.
 *
 * Notifications are informational: a failed delivery is logged and reported as
 * `delivered: false`, never as a Failure that would stop a build.
 */

import type { Logger } from 'pino';

import type { FetchFn } from '@/types/context';
import { extractErrorMessage } from '@/lib/error-utils';
import { DEFAULT_TIMEOUTS, NOTIFIER_USERNAME } from '@/config/constants';

export interface PushNotification {
  image: string;
  tag: string;
  digest: string;
}

export interface DiscordMessage {
  username: string;
  content: string;
}

export interface DeliveryOutcome {
  delivered: boolean;
  status?: number;
  error?: string;
}

export function formatPushMessage({ image, tag, digest }: PushNotification): DiscordMessage {
  const content = [
    '**New Image Pushed**',
    `**Image:** \`${image}\``,
    `**Tag:** \`${tag}\``,
    `**Digest:** \`${digest}\``,
    '',
    'Update your manifests to use this secure pinning!',
  ].join('\n');

  return { username: NOTIFIER_USERNAME, content };
}

export interface DiscordNotifier {
  send(message: DiscordMessage): Promise<DeliveryOutcome>;
}

export function createDiscordNotifier(webhookUrl: string, fetchFn: FetchFn, logger: Logger): DiscordNotifier {
  return {
    async send(message) {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), DEFAULT_TIMEOUTS.webhook);

      try {
        const response = await fetchFn(webhookUrl, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', 'User-Agent': 'Image-Factory-Notifier' },
          body: JSON.stringify(message),
          signal: controller.signal,
        });

        if (!response.ok) {
          logger.warn({ status: response.status, statusText: response.statusText }, 'Discord webhook rejected notification');
          return { delivered: false, status: response.status, error: `${response.status} ${response.statusText}` };
        }

        logger.info({ status: response.status }, 'Notification sent');
        return { delivered: true, status: response.status };
      } catch (error) {
        logger.warn({ err: error }, 'Failed to send Discord notification');
        return { delivered: false, error: extractErrorMessage(error) };
      } finally {
        clearTimeout(timer);
      }
    },
  };
}
