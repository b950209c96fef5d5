/**
 * Webhook API client
 */
export { createWebhookClient } from './webhook-client';
