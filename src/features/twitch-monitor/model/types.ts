/**
 * Twitch Helix API types
 */

import { z } from 'zod';

/**
 * Response of the client-credentials token exchange
 */
export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional(),
  token_type: z.string().optional(),
});

/**
 * A live stream entry from GET /helix/streams
 */
export const helixStreamSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  user_login: z.string(),
  user_name: z.string().optional(),
  game_id: z.string().default(''),
  game_name: z.string().default(''),
  type: z.string().default('live'),
  title: z.string().optional(),
  started_at: z.string().optional(),
});

export type HelixStream = z.infer<typeof helixStreamSchema>;

export const helixStreamsResponseSchema = z.object({
  data: z.array(helixStreamSchema),
  pagination: z.object({ cursor: z.string().optional() }).optional(),
});

/**
 * A category entry from GET /helix/games
 */
export const helixGameSchema = z.object({
  id: z.string(),
  name: z.string(),
});

export const helixGamesResponseSchema = z.object({
  data: z.array(helixGameSchema),
});

/**
 * Client credentials for the Twitch application
 */
export interface TwitchCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * State of the credential provider
 */
export type AuthState =
  | { status: 'unauthenticated' }
  | { status: 'authenticated'; token: string; expiresAt: number };
