/**
 * Twitch Category Notifier
 *
 * A long-running Node.js process that polls Twitch for category changes of
 * the configured channels and posts them to a webhook.
 */

import * as Sentry from '@sentry/node';
import { config as loadEnv } from 'dotenv';
import { createStateStore, toChannelStates } from '../entities/channel-state';
import { ConfigError, createLogger, setLogLevel } from '../shared';
import { loadConfig, type AppConfig } from './config';
import { createPollContext } from './context';
import { startPollLoop } from './poll-loop';

const log = createLogger('App');

/** Time allowed for Sentry to flush on shutdown */
const SENTRY_FLUSH_TIMEOUT_MS = 2000;

/**
 * Start the notifier and resolve with the process exit code once a
 * termination signal has stopped the loop
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  loadEnv();

  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[Config] ${error.message}`);
      return 1;
    }
    throw error;
  }

  setLogLevel(config.logLevel);

  if (config.sentry.dsn) {
    Sentry.init({
      dsn: config.sentry.dsn,
      environment: config.sentry.environment,
      tracesSampleRate: 1.0,
    });
    log.info('Sentry error reporting enabled');
  }

  const store = createStateStore(config.stateFile);
  const state = await store.load();
  for (const { login, lastCategory } of toChannelStates(state)) {
    log.debug(`  ${login}: ${lastCategory}`);
  }

  const ctx = createPollContext(config, store, state);

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}, stopping after the current cycle`);
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  log.info(
    `Monitoring ${config.channels.length} channel(s) every ${config.pollIntervalMs / 1000}s: ${config.channels.join(', ')}`
  );

  await startPollLoop(ctx, controller.signal);

  log.info(`Exiting. State saved to ${store.getPath()}`);
  await Sentry.close(SENTRY_FLUSH_TIMEOUT_MS);
  return 0;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('[App] Fatal startup error:', error);
      process.exitCode = 1;
    }
  );
}
