/**
 * Poll loop - fetch, detect, notify, persist, sleep
 *
 * One cycle runs at a time. A failed cycle leaves the state untouched and
 * is retried after a backoff that doubles per consecutive failure, capped
 * at maxBackoffMs.
 */

import * as Sentry from '@sentry/node';
import type { ChangeEvent } from '../entities/channel-status';
import { detectChanges, isSameState } from '../features/twitch-monitor';
import type { NotifyResult } from '../features/webhook-notifier';
import { TransientError, createLogger, errorKind, errorMessage, sleep } from '../shared';
import type { PollContext } from './context';

const log = createLogger('Poll');

/** Number of consecutive failed cycles before alerting */
export const ALERT_FAILURE_THRESHOLD = 3;

type FailedNotification = Extract<NotifyResult, { success: false }>;

export interface CycleResult {
  events: ChangeEvent[];

  /** Notifications accepted by the webhook */
  delivered: number;

  /** Notifications the webhook did not accept */
  failed: FailedNotification[];

  /** Channels recorded for the first time, without notification */
  firstSeen: string[];

  /** Whether the state file was rewritten */
  saved: boolean;
}

/**
 * Run one poll cycle
 *
 * A fetch error propagates with ctx.state unchanged. Once notifications
 * are out the in-memory state advances, even if the save then fails; the
 * save is retried on the next cycle. Delivery failures do not stop either:
 * the state always follows what Twitch reported.
 */
export async function runPollCycle(ctx: PollContext): Promise<CycleResult> {
  const statuses = await ctx.fetcher.fetchStatuses(ctx.channels);
  const { events, nextState, firstSeen } = detectChanges(statuses, ctx.state);

  if (firstSeen.length > 0) {
    log.info(`First observation of ${firstSeen.join(', ')}; recorded without notifying`);
  }

  const results = await ctx.notifier.notifyAll(events);
  const failed = results.filter((r): r is FailedNotification => !r.success);

  for (const result of failed) {
    Sentry.captureMessage(`Failed to deliver notification for ${result.event.login}`, {
      level: 'warning',
      tags: { kind: result.error.kind },
      extra: {
        login: result.event.login,
        oldCategory: result.event.oldCategory,
        newCategory: result.event.newCategory,
        status: result.error.status,
        error: result.error.message,
      },
    });
  }

  if (!isSameState(nextState, ctx.state)) {
    ctx.unsaved = true;
  }
  ctx.state = nextState;

  const saved = ctx.unsaved;
  if (saved) {
    await ctx.store.save(nextState);
    ctx.unsaved = false;
  }

  return {
    events,
    delivered: results.length - failed.length,
    failed,
    firstSeen,
    saved,
  };
}

/** Longest delay setTimeout accepts; larger values fire immediately */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Sleep before the next cycle
 *
 * interval after a success; min(interval * 2^failures, maxBackoff) after
 * failures, and never less than a server-requested retry delay. Capped at
 * MAX_TIMER_DELAY_MS.
 */
export function nextDelay(
  pollIntervalMs: number,
  maxBackoffMs: number,
  consecutiveFailures: number,
  retryAfterMs?: number
): number {
  let delay = pollIntervalMs;
  if (consecutiveFailures > 0) {
    const backoff = pollIntervalMs * 2 ** Math.min(consecutiveFailures, 30);
    delay = Math.max(pollIntervalMs, Math.min(backoff, maxBackoffMs));
  }
  if (retryAfterMs !== undefined) {
    delay = Math.max(delay, retryAfterMs);
  }
  return Math.min(delay, MAX_TIMER_DELAY_MS);
}

/**
 * Record a failed cycle: log it and alert once failures keep repeating
 */
function reportCycleFailure(ctx: PollContext, error: unknown): void {
  const kind = errorKind(error);
  log.error(`Cycle failed with ${kind} (${ctx.consecutiveFailures} in a row): ${errorMessage(error)}`);

  if (ctx.consecutiveFailures >= ALERT_FAILURE_THRESHOLD) {
    Sentry.captureException(error, {
      tags: { kind },
      extra: { consecutiveFailures: ctx.consecutiveFailures },
    });
  }
}

/**
 * Run cycles until the signal aborts
 *
 * A cycle in progress completes before the loop returns.
 */
export async function startPollLoop(ctx: PollContext, signal: AbortSignal): Promise<void> {
  while (!signal.aborted) {
    let retryAfterMs: number | undefined;

    try {
      const result = await runPollCycle(ctx);
      ctx.consecutiveFailures = 0;
      log.debug(
        `Cycle complete: ${result.events.length} change(s), ${result.delivered} delivered, ${result.failed.length} failed`
      );
    } catch (error) {
      ctx.consecutiveFailures += 1;
      if (error instanceof TransientError) {
        retryAfterMs = error.retryAfterMs;
      }
      reportCycleFailure(ctx, error);
    }

    if (signal.aborted) {
      break;
    }

    const delay = nextDelay(ctx.pollIntervalMs, ctx.maxBackoffMs, ctx.consecutiveFailures, retryAfterMs);
    if (delay !== ctx.pollIntervalMs) {
      log.info(`Next poll in ${Math.round(delay / 1000)}s`);
    }
    await sleep(delay, signal);
  }
}
