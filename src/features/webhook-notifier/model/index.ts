/**
 * Webhook notifier model exports
 */
export type {
  WebhookFormat,
  WebhookPayload,
  NotifyResult,
  WebhookNotifierOptions,
} from './types';
