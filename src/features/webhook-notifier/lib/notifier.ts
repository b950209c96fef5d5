/**
 * Change notifier
 *
 * Sends one webhook message per change. Delivery failures are returned as
 * results, never thrown, so the caller can keep processing the cycle.
 */

import type { ChangeEvent } from '../../../entities/channel-status';
import { createLogger, DeliveryError } from '../../../shared';
import { createWebhookClient } from '../api';
import type { NotifyResult, WebhookNotifierOptions } from '../model';
import { buildPayload, formatChangeMessage } from './message-formatter';

const log = createLogger('Webhook');

/**
 * Create a notifier for the configured webhook
 */
export function createWebhookNotifier(options: WebhookNotifierOptions) {
  const { webhookUrl, format = 'discord', timeoutMs, now = () => new Date() } = options;
  const client = createWebhookClient(webhookUrl, timeoutMs);

  return {
    /**
     * Notify a single change
     */
    async notify(event: ChangeEvent): Promise<NotifyResult> {
      log.info(formatChangeMessage(event).split('\n')[0]);

      try {
        await client.send(buildPayload(event, format, now()));
        return { success: true, event };
      } catch (error) {
        const deliveryError =
          error instanceof DeliveryError
            ? error
            : new DeliveryError(`Webhook request failed for ${event.login}`, { cause: error });
        log.error(`DeliveryError for ${event.login}: ${deliveryError.message}`);
        return { success: false, event, error: deliveryError };
      }
    },

    /**
     * Notify changes one after another, in order
     */
    async notifyAll(events: ChangeEvent[]): Promise<NotifyResult[]> {
      const results: NotifyResult[] = [];
      for (const event of events) {
        results.push(await this.notify(event));
      }
      return results;
    },
  };
}

/**
 * Type for the notifier
 */
export type WebhookNotifier = ReturnType<typeof createWebhookNotifier>;
