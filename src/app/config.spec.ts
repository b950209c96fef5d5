import { ConfigError } from '../shared';
import { loadConfig, parseChannelList } from './config';

const baseEnv = {
  TWITCH_CLIENT_ID: 'test-client',
  TWITCH_CLIENT_SECRET: 'test-secret',
  WEBHOOK_URL: 'https://hooks.example.com/webhooks/test-hook',
  STREAMERS: 'alpha,beta',
};

function configIssues(env: NodeJS.ProcessEnv): string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig(baseEnv)).toEqual({
      twitch: { clientId: 'test-client', clientSecret: 'test-secret' },
      webhook: { url: 'https://hooks.example.com/webhooks/test-hook', format: 'discord' },
      channels: ['alpha', 'beta'],
      pollIntervalMs: 60_000,
      maxBackoffMs: 900_000,
      requestTimeoutMs: 10_000,
      stateFile: 'state.json',
      logLevel: 'info',
      sentry: { dsn: undefined, environment: 'production' },
    });
  });

  it('reads optional settings', () => {
    const config = loadConfig({
      ...baseEnv,
      POLL_INTERVAL: '30',
      MAX_BACKOFF: '300',
      REQUEST_TIMEOUT_MS: '5000',
      STATE_FILE: '/data/state.json',
      WEBHOOK_FORMAT: 'JSON',
      LOG_LEVEL: 'debug',
      SENTRY_DSN: 'https://public@sentry.example.com/1',
      NODE_ENV: 'staging',
    });

    expect(config.pollIntervalMs).toBe(30_000);
    expect(config.maxBackoffMs).toBe(300_000);
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.stateFile).toBe('/data/state.json');
    expect(config.webhook.format).toBe('json');
    expect(config.logLevel).toBe('debug');
    expect(config.sentry).toEqual({ dsn: 'https://public@sentry.example.com/1', environment: 'staging' });
  });

  it('accepts DISCORD_WEBHOOK_URL as the webhook', () => {
    const config = loadConfig({
      TWITCH_CLIENT_ID: 'test-client',
      TWITCH_CLIENT_SECRET: 'test-secret',
      DISCORD_WEBHOOK_URL: 'https://discord.example.com/api/webhooks/1/test',
      STREAMERS: 'alpha',
    });

    expect(config.webhook.url).toBe('https://discord.example.com/api/webhooks/1/test');
  });

  it('treats blank optional values as unset', () => {
    const config = loadConfig({ ...baseEnv, POLL_INTERVAL: '  ', SENTRY_DSN: '' });

    expect(config.pollIntervalMs).toBe(60_000);
    expect(config.sentry.dsn).toBeUndefined();
  });

  it('lists every missing setting', () => {
    expect(configIssues({})).toEqual([
      'TWITCH_CLIENT_ID is required',
      'TWITCH_CLIENT_SECRET is required',
      'WEBHOOK_URL is required',
      'STREAMERS must list at least one channel (comma-separated Twitch logins)',
    ]);
  });

  it('rejects a streamer list without entries', () => {
    expect(configIssues({ ...baseEnv, STREAMERS: ' , ,' })).toEqual([
      'STREAMERS must list at least one channel (comma-separated Twitch logins)',
    ]);
  });

  it.each([
    ['POLL_INTERVAL', '0'],
    ['POLL_INTERVAL', 'soon'],
    ['MAX_BACKOFF', '2.5'],
    ['REQUEST_TIMEOUT_MS', '-100'],
  ])('rejects %s=%s', (name, value) => {
    expect(configIssues({ ...baseEnv, [name]: value })).toEqual([`${name} must be a positive integer`]);
  });

  it('rejects a webhook that is not an http(s) URL', () => {
    expect(configIssues({ ...baseEnv, WEBHOOK_URL: 'ftp://hooks.example.com' })).toEqual([
      'WEBHOOK_URL must be an http(s) URL',
    ]);
    expect(configIssues({ ...baseEnv, WEBHOOK_URL: 'not a url' })).toEqual(['WEBHOOK_URL must be an http(s) URL']);
  });

  it('rejects unknown enum values', () => {
    expect(configIssues({ ...baseEnv, WEBHOOK_FORMAT: 'slack', LOG_LEVEL: 'verbose' })).toEqual([
      'WEBHOOK_FORMAT must be "discord" or "json"',
      'LOG_LEVEL must be debug, info, warn or error',
    ]);
  });

  it('rejects a backoff cap below the poll interval', () => {
    expect(configIssues({ ...baseEnv, POLL_INTERVAL: '120', MAX_BACKOFF: '60' })).toEqual([
      'MAX_BACKOFF must not be less than POLL_INTERVAL',
    ]);
  });

  it('throws a ConfigError whose message lists the issues', () => {
    expect(() => loadConfig({ ...baseEnv, TWITCH_CLIENT_ID: '' })).toThrow(
      'Invalid configuration:\n  - TWITCH_CLIENT_ID is required'
    );
  });
});

describe('parseChannelList', () => {
  it('trims, lowercases and removes duplicates in order', () => {
    expect(parseChannelList(' Alpha, beta ,,ALPHA,gamma ')).toEqual(['alpha', 'beta', 'gamma']);
  });

  it('returns an empty list for blank input', () => {
    expect(parseChannelList('')).toEqual([]);
  });
});
