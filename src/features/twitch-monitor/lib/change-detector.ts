/**
 * Category change detection
 *
 * Compares freshly fetched statuses with the recorded state. A channel seen
 * for the first time is recorded without an event so a fresh install does
 * not announce every channel.
 */

import { categoryOf, type ChangeEvent, type ChannelStatus } from '../../../entities/channel-status';
import type { ChannelStateMap } from '../../../entities/channel-state';

export interface DetectionResult {
  /** Changes in the order of `current` */
  events: ChangeEvent[];

  /** `previous` with every observed channel updated */
  nextState: ChannelStateMap;

  /** Logins recorded for the first time */
  firstSeen: string[];
}

/**
 * Diff current statuses against the previous state
 *
 * `previous` is not modified. Channels absent from `current` keep their
 * recorded category.
 */
export function detectChanges(
  current: Map<string, ChannelStatus>,
  previous: ChannelStateMap
): DetectionResult {
  const events: ChangeEvent[] = [];
  const firstSeen: string[] = [];
  const nextState: ChannelStateMap = { ...previous };

  for (const [login, status] of current) {
    const newCategory = categoryOf(status);
    const oldCategory = Object.prototype.hasOwnProperty.call(previous, login) ? previous[login] : undefined;

    if (oldCategory === undefined) {
      firstSeen.push(login);
    } else if (oldCategory !== newCategory) {
      events.push({ login, oldCategory, newCategory });
    }

    nextState[login] = newCategory;
  }

  return { events, nextState, firstSeen };
}

/**
 * Whether two state maps hold the same entries
 */
export function isSameState(a: ChannelStateMap, b: ChannelStateMap): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) {
    return false;
  }
  return keys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}
