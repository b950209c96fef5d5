/**
 * Application configuration
 *
 * Read once from the environment at startup, validated, and passed into
 * each component. Nothing else reads process.env.
 */

import { z } from 'zod';
import { ConfigError, type LogLevel } from '../shared';
import type { WebhookFormat } from '../features/webhook-notifier';

export interface AppConfig {
  twitch: {
    clientId: string;
    clientSecret: string;
  };

  webhook: {
    url: string;
    format: WebhookFormat;
  };

  /** Lowercased channel logins, in configured order */
  channels: string[];

  pollIntervalMs: number;

  /** Upper bound of the sleep after repeated failed cycles */
  maxBackoffMs: number;

  requestTimeoutMs: number;

  /** Path of the state file, relative to the working directory */
  stateFile: string;

  logLevel: LogLevel;

  sentry: {
    dsn?: string;
    environment: string;
  };
}

/** Default poll interval in seconds */
export const DEFAULT_POLL_INTERVAL_SECONDS = 60;

/** Default cap on the backoff sleep in seconds */
export const DEFAULT_MAX_BACKOFF_SECONDS = 900;

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export const DEFAULT_STATE_FILE = 'state.json';

/** Treat unset and blank variables alike */
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const requiredString = (name: string) =>
  z.preprocess(blankAsUndefined, z.string({ required_error: `${name} is required` }).trim());

const optionalString = () => z.preprocess(blankAsUndefined, z.string().trim().optional());

const positiveInt = (name: string, fallback: number) =>
  z.preprocess(
    blankAsUndefined,
    z.coerce
      .number({ invalid_type_error: `${name} must be a positive integer` })
      .int(`${name} must be a positive integer`)
      .positive(`${name} must be a positive integer`)
      .default(fallback)
  );

const envSchema = z.object({
  TWITCH_CLIENT_ID: requiredString('TWITCH_CLIENT_ID'),
  TWITCH_CLIENT_SECRET: requiredString('TWITCH_CLIENT_SECRET'),
  POLL_INTERVAL: positiveInt('POLL_INTERVAL', DEFAULT_POLL_INTERVAL_SECONDS),
  MAX_BACKOFF: positiveInt('MAX_BACKOFF', DEFAULT_MAX_BACKOFF_SECONDS),
  REQUEST_TIMEOUT_MS: positiveInt('REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
  STATE_FILE: z.preprocess(blankAsUndefined, z.string().default(DEFAULT_STATE_FILE)),
  WEBHOOK_FORMAT: z.preprocess(
    (value) => (typeof value === 'string' ? blankAsUndefined(value.toLowerCase()) : value),
    z
      .enum(['discord', 'json'], { message: 'WEBHOOK_FORMAT must be "discord" or "json"' })
      .default('discord')
  ),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? blankAsUndefined(value.toLowerCase()) : value),
    z
      .enum(['debug', 'info', 'warn', 'error'], { message: 'LOG_LEVEL must be debug, info, warn or error' })
      .default('info')
  ),
  SENTRY_DSN: optionalString(),
  NODE_ENV: z.preprocess(blankAsUndefined, z.string().default('production')),
});

/**
 * Split a comma-separated channel list into normalized logins
 *
 * Entries are trimmed and lowercased; blanks and duplicates are dropped.
 */
export function parseChannelList(raw: string): string[] {
  const logins = raw
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);
  return [...new Set(logins)];
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Build the configuration from environment variables
 *
 * @throws ConfigError listing every missing or invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  const issues: string[] = parsed.success ? [] : parsed.error.issues.map((issue) => issue.message);

  const webhookUrl = env.WEBHOOK_URL?.trim() || env.DISCORD_WEBHOOK_URL?.trim();
  if (!webhookUrl) {
    issues.push('WEBHOOK_URL is required');
  } else if (!isHttpUrl(webhookUrl)) {
    issues.push('WEBHOOK_URL must be an http(s) URL');
  }

  const channels = parseChannelList(env.STREAMERS ?? '');
  if (channels.length === 0) {
    issues.push('STREAMERS must list at least one channel (comma-separated Twitch logins)');
  }

  if (parsed.success && parsed.data.MAX_BACKOFF < parsed.data.POLL_INTERVAL) {
    issues.push('MAX_BACKOFF must not be less than POLL_INTERVAL');
  }

  if (!parsed.success || !webhookUrl || issues.length > 0) {
    throw new ConfigError(issues);
  }

  const vars = parsed.data;

  return {
    twitch: {
      clientId: vars.TWITCH_CLIENT_ID,
      clientSecret: vars.TWITCH_CLIENT_SECRET,
    },
    webhook: {
      url: webhookUrl,
      format: vars.WEBHOOK_FORMAT,
    },
    channels,
    pollIntervalMs: vars.POLL_INTERVAL * 1000,
    maxBackoffMs: vars.MAX_BACKOFF * 1000,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    stateFile: vars.STATE_FILE,
    logLevel: vars.LOG_LEVEL,
    sentry: {
      dsn: vars.SENTRY_DSN,
      environment: vars.NODE_ENV,
    },
  };
}
