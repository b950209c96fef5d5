/**
 * Channel status fetching with a single token refresh
 *
 * Authenticated -> (401/403) -> Unauthenticated -> Authenticated, at most
 * once per call, so a persistently rejected token cannot loop.
 */

import { AuthError, createLogger } from '../../../shared';
import type { ChannelStatus } from '../../../entities/channel-status';
import type { CredentialProvider, TwitchClient } from '../api';

const log = createLogger('Twitch');

/** Token refreshes allowed per fetch */
const MAX_AUTH_RETRIES = 1;

/**
 * Create a status fetcher bound to a credential provider and Helix client
 */
export function createStatusFetcher(credentials: CredentialProvider, client: TwitchClient) {
  return {
    /**
     * Fetch the status of every login, refreshing the token once if the
     * API rejects it
     */
    async fetchStatuses(logins: string[]): Promise<Map<string, ChannelStatus>> {
      let attempt = 0;

      for (;;) {
        const token = await credentials.getToken();
        try {
          return await client.fetchStatuses(logins, token);
        } catch (error) {
          if (!(error instanceof AuthError) || attempt >= MAX_AUTH_RETRIES) {
            throw error;
          }
          attempt += 1;
          log.warn(`${error.message}; refreshing token and retrying`);
          credentials.invalidate();
        }
      }
    },
  };
}

/**
 * Type for the status fetcher
 */
export type StatusFetcher = ReturnType<typeof createStatusFetcher>;
