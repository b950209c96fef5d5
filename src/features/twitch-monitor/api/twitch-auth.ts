/**
 * Twitch app access token provider
 *
 * Obtains a client-credentials token and caches it until shortly before it
 * expires. The Helix client reports 401/403 by calling `invalidate()`,
 * which moves the provider back to `unauthenticated` so the next
 * `getToken()` requests a fresh token.
 */

import { createHttpClient, createLogger, TWITCH_AUTH_URL } from '../../../shared';
import { tokenResponseSchema, type AuthState, type TwitchCredentials } from '../model';
import { toTokenError } from './errors';

const log = createLogger('Twitch');

/** Refresh this long before the token expires */
const REFRESH_MARGIN_MS = 60_000;

/** Lifetime assumed when the response omits expires_in */
const DEFAULT_EXPIRES_IN_SECONDS = 3600;

export interface CredentialProviderOptions extends TwitchCredentials {
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;

  /** Token endpoint (overridable for tests) */
  authUrl?: string;

  /** Clock (overridable for tests) */
  now?: () => number;
}

/**
 * Create a credential provider for the Twitch application
 */
export function createCredentialProvider(options: CredentialProviderOptions) {
  const { clientId, clientSecret, timeoutMs, authUrl = TWITCH_AUTH_URL, now = Date.now } = options;
  const http = createHttpClient({ timeout: timeoutMs });

  let state: AuthState = { status: 'unauthenticated' };

  async function requestToken(): Promise<string> {
    log.debug('Requesting new app access token');

    let raw: unknown;
    try {
      raw = await http.postForm<unknown>(authUrl, {
        client_id: clientId,
        client_secret: clientSecret,
        grant_type: 'client_credentials',
      });
    } catch (error) {
      throw toTokenError(error);
    }

    const parsed = tokenResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw toTokenError(new Error('Token response is missing access_token'));
    }

    const expiresIn = parsed.data.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;
    state = {
      status: 'authenticated',
      token: parsed.data.access_token,
      expiresAt: now() + expiresIn * 1000,
    };
    log.debug(`Obtained app token; expires in ${expiresIn}s`);

    return parsed.data.access_token;
  }

  return {
    /**
     * Return a valid bearer token, requesting one when needed
     */
    async getToken(): Promise<string> {
      if (state.status === 'authenticated' && now() < state.expiresAt - REFRESH_MARGIN_MS) {
        return state.token;
      }
      state = { status: 'unauthenticated' };
      return requestToken();
    },

    /**
     * Drop the cached token after the API rejected it
     */
    invalidate(): void {
      if (state.status === 'authenticated') {
        log.info('Discarding rejected app token');
      }
      state = { status: 'unauthenticated' };
    },

    /**
     * Current state of the provider
     */
    getStatus(): AuthState['status'] {
      return state.status;
    },
  };
}

/**
 * Type for the credential provider
 */
export type CredentialProvider = ReturnType<typeof createCredentialProvider>;
