/**
 * Twitch OAuth token endpoint
 */
export const TWITCH_AUTH_URL = 'https://id.twitch.tv/oauth2/token';

/**
 * Twitch Helix API base URL
 */
export const TWITCH_API_URL = 'https://api.twitch.tv/helix/';

/**
 * Public channel page base URL
 */
export const TWITCH_CHANNEL_BASE_URL = 'https://www.twitch.tv';

/**
 * Maximum number of logins or ids Helix accepts in one request
 */
export const HELIX_MAX_BATCH_SIZE = 100;
