/**
 * Poll context wiring
 *
 * Builds every collaborator from the configuration. The context is owned
 * by the poll loop for the lifetime of the process.
 */

import type { ChannelStateMap, StateStore } from '../entities/channel-state';
import {
  createCredentialProvider,
  createStatusFetcher,
  createTwitchClient,
  type StatusFetcher,
} from '../features/twitch-monitor';
import { createWebhookNotifier, type WebhookNotifier } from '../features/webhook-notifier';
import type { AppConfig } from './config';

export interface PollContext {
  /** Logins to watch, in notification order */
  channels: string[];

  fetcher: Pick<StatusFetcher, 'fetchStatuses'>;
  notifier: Pick<WebhookNotifier, 'notifyAll'>;
  store: Pick<StateStore, 'save'>;

  /** Last observed state */
  state: ChannelStateMap;

  /** Whether `state` has changes the last save did not write */
  unsaved: boolean;

  /** Failed cycles since the last successful one */
  consecutiveFailures: number;

  pollIntervalMs: number;
  maxBackoffMs: number;
}

/**
 * Create the poll context for a loaded state
 */
export function createPollContext(
  config: AppConfig,
  store: StateStore,
  state: ChannelStateMap
): PollContext {
  const credentials = createCredentialProvider({
    clientId: config.twitch.clientId,
    clientSecret: config.twitch.clientSecret,
    timeoutMs: config.requestTimeoutMs,
  });
  const client = createTwitchClient({
    clientId: config.twitch.clientId,
    timeoutMs: config.requestTimeoutMs,
  });

  return {
    channels: config.channels,
    fetcher: createStatusFetcher(credentials, client),
    notifier: createWebhookNotifier({
      webhookUrl: config.webhook.url,
      format: config.webhook.format,
      timeoutMs: config.requestTimeoutMs,
    }),
    store,
    state,
    unsaved: false,
    consecutiveFailures: 0,
    pollIntervalMs: config.pollIntervalMs,
    maxBackoffMs: config.maxBackoffMs,
  };
}
