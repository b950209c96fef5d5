/**
 * Webhook notification types
 */

import type { ChangeEvent } from '../../../entities/channel-status';
import type { DeliveryError } from '../../../shared';

/**
 * Body layout sent to the webhook
 *
 * - `discord`: `{ content }`, accepted by Discord and most chat webhooks
 * - `json`: `{ content, event }` with the structured change
 */
export type WebhookFormat = 'discord' | 'json';

export interface DiscordPayload {
  content: string;
}

export interface JsonPayload {
  content: string;
  event: {
    login: string;
    oldCategory: string;
    newCategory: string;
    /** ISO timestamp of when the change was detected */
    detectedAt: string;
  };
}

export type WebhookPayload = DiscordPayload | JsonPayload;

/**
 * Result of notifying one change
 */
export type NotifyResult =
  | { success: true; event: ChangeEvent }
  | { success: false; event: ChangeEvent; error: DeliveryError };

export interface WebhookNotifierOptions {
  webhookUrl: string;
  format?: WebhookFormat;

  /** Per-request timeout in milliseconds */
  timeoutMs?: number;

  /** Clock (overridable for tests) */
  now?: () => Date;
}
