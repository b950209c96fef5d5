/**
 * Twitch Helix API client
 *
 * Uses GET /helix/streams with repeated `user_login` params, which returns
 * only channels that are live. Every requested login that is missing from
 * the response is reported offline.
 */

import { z } from 'zod';
import {
  createHttpClient,
  createLogger,
  TransientError,
  HELIX_MAX_BATCH_SIZE,
  TWITCH_API_URL,
} from '../../../shared';
import { offlineStatus, UNKNOWN_CATEGORY, type ChannelStatus } from '../../../entities/channel-status';
import {
  helixGamesResponseSchema,
  helixStreamsResponseSchema,
  type HelixStream,
} from '../model';
import { toApiError } from './errors';

const log = createLogger('Twitch');

export interface TwitchClientOptions {
  clientId: string;

  /** Per-request timeout in milliseconds */
  timeoutMs?: number;

  /** Helix base URL (overridable for tests) */
  apiUrl?: string;
}

/**
 * Split a list into chunks of at most `size` items
 */
export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Parse a response body, reporting an unexpected shape as a transient failure
 */
function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown, context: string): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new TransientError(`${context}: unexpected response shape`, { cause: result.error });
  }
  return result.data;
}

/**
 * Create a Twitch Helix API client
 */
export function createTwitchClient(options: TwitchClientOptions) {
  const { clientId, timeoutMs, apiUrl = TWITCH_API_URL } = options;
  const http = createHttpClient({
    baseUrl: apiUrl,
    headers: { 'Client-Id': clientId },
    timeout: timeoutMs,
  });

  /** Category id -> name, kept for the process lifetime */
  const gameNames = new Map<string, string>();

  return {
    /**
     * Fetch live streams for up to HELIX_MAX_BATCH_SIZE logins
     */
    async fetchStreams(logins: string[], token: string): Promise<HelixStream[]> {
      if (logins.length === 0) {
        return [];
      }
      if (logins.length > HELIX_MAX_BATCH_SIZE) {
        throw new RangeError(`At most ${HELIX_MAX_BATCH_SIZE} logins per request, got ${logins.length}`);
      }

      let body: unknown;
      try {
        body = await http.get<unknown>('streams', {
          params: { user_login: logins, first: HELIX_MAX_BATCH_SIZE },
          headers: { Authorization: `Bearer ${token}` },
        });
      } catch (error) {
        throw toApiError(error, 'Fetching streams failed');
      }

      return parseBody(helixStreamsResponseSchema, body, 'Fetching streams failed').data;
    },

    /**
     * Resolve category names for the given ids, using the cache first
     */
    async fetchGameNames(ids: string[], token: string): Promise<Map<string, string>> {
      const missing = [...new Set(ids)].filter((id) => id && !gameNames.has(id));

      for (const batch of chunk(missing, HELIX_MAX_BATCH_SIZE)) {
        let body: unknown;
        try {
          body = await http.get<unknown>('games', {
            params: { id: batch },
            headers: { Authorization: `Bearer ${token}` },
          });
        } catch (error) {
          throw toApiError(error, 'Fetching categories failed');
        }

        for (const game of parseBody(helixGamesResponseSchema, body, 'Fetching categories failed').data) {
          gameNames.set(game.id, game.name);
        }
      }

      const names = new Map<string, string>();
      for (const id of ids) {
        const name = gameNames.get(id);
        if (name) {
          names.set(id, name);
        }
      }
      return names;
    },

    /**
     * Fetch the status of every login, batching at the Helix limit
     *
     * The returned map has an entry for every login, in input order.
     */
    async fetchStatuses(logins: string[], token: string): Promise<Map<string, ChannelStatus>> {
      const statuses = new Map<string, ChannelStatus>();
      for (const login of logins) {
        statuses.set(login, offlineStatus(login));
      }

      const streams: HelixStream[] = [];
      for (const batch of chunk([...statuses.keys()], HELIX_MAX_BATCH_SIZE)) {
        streams.push(...(await this.fetchStreams(batch, token)));
      }

      const unnamedIds = streams.filter((s) => !s.game_name && s.game_id).map((s) => s.game_id);
      const resolved = unnamedIds.length > 0 ? await this.fetchGameNames(unnamedIds, token) : new Map<string, string>();

      for (const stream of streams) {
        const login = stream.user_login.toLowerCase();
        if (!statuses.has(login) || stream.type !== 'live') {
          continue;
        }
        const category = stream.game_name || resolved.get(stream.game_id) || UNKNOWN_CATEGORY;
        statuses.set(login, { login, isLive: true, category });
      }

      const liveCount = [...statuses.values()].filter((s) => s.isLive).length;
      log.debug(`Fetched ${statuses.size} channel(s), ${liveCount} live`);

      return statuses;
    },
  };
}

/**
 * Type for the Twitch client
 */
export type TwitchClient = ReturnType<typeof createTwitchClient>;
