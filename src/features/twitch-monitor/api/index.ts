/**
 * Twitch monitor API clients
 */
export { createCredentialProvider, type CredentialProvider } from './twitch-auth';
export { createTwitchClient, type TwitchClient } from './twitch-client';
