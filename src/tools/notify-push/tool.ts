/**
 * Announce a pushed image on Discord so consumers can pin the new digest.
 *
 * Delivery problems are logged only; the push already happened and a missing
 * chat message must not turn a green pipeline red.
 */

import { z } from 'zod';

import { setupToolContext } from '@/lib/tool-helpers';
import { createDiscordNotifier, formatPushMessage } from '@/infra/notify/discord';
import type { ToolContext } from '@/types/context';
import { Success, type Result } from '@/types/core';
import { tool } from '@/types/tool';
import { type NotifyPushParams, notifyPushSchema } from './schema';

const webhookUrlSchema = z.string().url();

export interface NotifyPushResult {
  sent: boolean;
  /** Why nothing was delivered */
  reason?: string;
}

async function handleNotifyPush(params: NotifyPushParams, context: ToolContext): Promise<Result<NotifyPushResult>> {
  const { logger, timer } = setupToolContext(context, 'notify-push');
  const webhookUrl = context.config.notifications.discordWebhook;

  if (!webhookUrl) {
    logger.info('Skipping notification: DISCORD_WEBHOOK not set.');
    timer.end({ sent: false });
    return Success({ sent: false, reason: 'DISCORD_WEBHOOK not set' });
  }

  if (!webhookUrlSchema.safeParse(webhookUrl).success) {
    logger.warn('Skipping notification: DISCORD_WEBHOOK is not a valid URL.');
    timer.end({ sent: false });
    return Success({ sent: false, reason: 'DISCORD_WEBHOOK is not a valid URL' });
  }

  logger.info({ image: params.image, tag: params.tag }, 'Sending Discord notification');
  const notifier = createDiscordNotifier(webhookUrl, context.fetch, logger);
  const outcome = await notifier.send(formatPushMessage(params));

  timer.end({ sent: outcome.delivered });
  if (!outcome.delivered) {
    return Success({ sent: false, reason: outcome.error ?? 'delivery failed' });
  }
  return Success({ sent: true });
}

export const notifyPush = handleNotifyPush;

export default tool({
  name: 'notify-push',
  description: 'Send a Discord notification for a pushed image digest',
  category: 'reporting',
  schema: notifyPushSchema,
  handler: handleNotifyPush,
});
