/**
 * Channel state entity - public API
 */
export {
  type ChannelState,
  type ChannelStateMap,
  channelStateMapSchema,
  toChannelStates,
} from './types';

export { createStateStore, serializeState, type StateStore } from './state-store';
