/**
 * Webhook HTTP client
 */

import { createHttpClient, DeliveryError, HttpError, errorMessage } from '../../../shared';
import type { WebhookPayload } from '../model';

/**
 * Create a client that posts payloads to a single webhook URL
 */
export function createWebhookClient(webhookUrl: string, timeoutMs?: number) {
  const http = createHttpClient({ timeout: timeoutMs });

  return {
    /**
     * POST a payload. Throws DeliveryError on a non-2xx response or a
     * network failure.
     */
    async send(payload: WebhookPayload): Promise<void> {
      try {
        await http.post<unknown>(webhookUrl, payload);
      } catch (error) {
        if (error instanceof HttpError) {
          throw new DeliveryError(`Webhook responded with HTTP ${error.status} ${error.statusText}`, {
            cause: error,
            status: error.status,
          });
        }
        throw new DeliveryError(`Webhook request failed: ${errorMessage(error)}`, { cause: error });
      }
    },
  };
}

/**
 * Type for the webhook client
 */
export type WebhookClient = ReturnType<typeof createWebhookClient>;
