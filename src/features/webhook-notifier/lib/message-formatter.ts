/**
 * Message formatting utilities
 *
 * Formats change events into webhook messages
 */

import { OFFLINE, type ChangeEvent } from '../../../entities/channel-status';
import { TWITCH_CHANNEL_BASE_URL } from '../../../shared';
import type { WebhookFormat, WebhookPayload } from '../model';

/**
 * Maximum length of a Discord message (2000 characters)
 */
const MAX_MESSAGE_LENGTH = 2000;

/**
 * Truncate text to fit within a maximum length
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 3) + '...';
}

/**
 * Build the public channel URL for a login
 */
export function buildChannelUrl(login: string): string {
  return `${TWITCH_CHANNEL_BASE_URL}/${login}`;
}

/**
 * Describe a change in one line
 */
function describeChange(event: ChangeEvent): string {
  const name = `**${event.login}**`;

  if (event.oldCategory === OFFLINE) {
    return `${name} went live: ${event.newCategory}`;
  }
  if (event.newCategory === OFFLINE) {
    return `${name} went offline (was ${event.oldCategory})`;
  }
  return `${name} changed category: ${event.oldCategory} → ${event.newCategory}`;
}

/**
 * Format a change event into a message
 */
export function formatChangeMessage(event: ChangeEvent): string {
  return truncateText(`${describeChange(event)}\n${buildChannelUrl(event.login)}`, MAX_MESSAGE_LENGTH);
}

/**
 * Build the webhook body for a change event
 */
export function buildPayload(event: ChangeEvent, format: WebhookFormat, detectedAt: Date): WebhookPayload {
  const content = formatChangeMessage(event);

  if (format === 'json') {
    return {
      content,
      event: {
        login: event.login,
        oldCategory: event.oldCategory,
        newCategory: event.newCategory,
        detectedAt: detectedAt.toISOString(),
      },
    };
  }

  return { content };
}
