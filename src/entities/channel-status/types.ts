/**
 * Channel status types - what a poll observes and what a change looks like
 */

/**
 * Category value recorded for a channel that is not live
 */
export const OFFLINE = 'offline';

/**
 * Category reported for a live stream that has no category set
 */
export const UNKNOWN_CATEGORY = 'Unknown';

/**
 * Live status of a channel as fetched in one poll cycle
 */
export interface ChannelStatus {
  /** Lowercased channel login */
  login: string;

  /** Whether the channel is broadcasting */
  isLive: boolean;

  /** Category name while live, null when offline */
  category: string | null;
}

/**
 * A detected category change for one channel
 */
export interface ChangeEvent {
  login: string;

  /** Last recorded category, or OFFLINE */
  oldCategory: string;

  /** Newly observed category, or OFFLINE */
  newCategory: string;
}

/**
 * Create the status of a channel that is not live
 */
export function offlineStatus(login: string): ChannelStatus {
  return { login, isLive: false, category: null };
}

/**
 * The category value to record for a status
 */
export function categoryOf(status: ChannelStatus): string {
  return status.isLive ? (status.category ?? UNKNOWN_CATEGORY) : OFFLINE;
}
