/**
 * Twitch monitor model exports
 */
export {
  tokenResponseSchema,
  helixStreamsResponseSchema,
  helixGamesResponseSchema,
  type HelixStream,
  type TwitchCredentials,
  type AuthState,
} from './types';
