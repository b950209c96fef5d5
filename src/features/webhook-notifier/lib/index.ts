/**
 * Webhook notifier logic
 */
export { createWebhookNotifier, type WebhookNotifier } from './notifier';
