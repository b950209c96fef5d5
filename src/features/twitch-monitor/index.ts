/**
 * Twitch Monitor feature - public API
 *
 * Fetches channel status from Twitch and detects category changes
 */

// API clients
export { createCredentialProvider, createTwitchClient } from './api';

// Detection logic
export { createStatusFetcher, detectChanges, isSameState, type StatusFetcher } from './lib';
