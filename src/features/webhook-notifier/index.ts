/**
 * Webhook Notifier feature - public API
 *
 * Posts category changes to a webhook
 */

// Types
export type { NotifyResult, WebhookFormat } from './model';

// Notification logic
export { createWebhookNotifier, type WebhookNotifier } from './lib';
