/**
 * Channel state types for the persisted state file
 */

import { z } from 'zod';

/**
 * Last known category of a single channel
 */
export interface ChannelState {
  login: string;

  /** Category name, or OFFLINE */
  lastCategory: string;
}

/**
 * Complete persisted state: channel login -> last category
 */
export type ChannelStateMap = Record<string, string>;

/**
 * Shape accepted when reading the state file
 */
export const channelStateMapSchema = z.record(z.string(), z.string());

/**
 * List the entries of a state map as ChannelState records
 */
export function toChannelStates(state: ChannelStateMap): ChannelState[] {
  return Object.entries(state).map(([login, lastCategory]) => ({ login, lastCategory }));
}
