/**
 * Twitch monitor logic
 */
export { createStatusFetcher, type StatusFetcher } from './status-fetcher';
export { detectChanges, isSameState } from './change-detector';
