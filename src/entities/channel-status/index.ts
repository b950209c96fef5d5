/**
 * Channel status entity - public API
 */
export {
  type ChannelStatus,
  type ChangeEvent,
  OFFLINE,
  UNKNOWN_CATEGORY,
  offlineStatus,
  categoryOf,
} from './types';
