import { DateTime } from 'luxon';

import { config } from '@config/env.config.js';

import { logger } from '@utils/logger.js';
import { systemClock, type Clock } from '@utils/time.js';

import type { ConversationStateStore } from './state.store.js';

export interface SweeperOptions {
  ttlMinutes?: number;
  intervalSeconds?: number;
  clock?: Clock;
}

/** Discards sessions idle for longer than `ttlMinutes`. Slots are not touched. */
export function scanAndExpire(
  store: ConversationStateStore,
  ttlMinutes = config.SESSION_TTL_MINUTES,
  clock: Clock = systemClock,
): string[] {
  const cutoff = DateTime.fromJSDate(clock()).minus({ minutes: ttlMinutes }).toJSDate();
  const expired = store.expireIdle(cutoff);
  if (expired.length) {
    logger.info('[timeout] expired idle sessions', { count: expired.length, ttlMinutes });
  }
  return expired;
}

export function startSessionSweeper(
  store: ConversationStateStore,
  options: SweeperOptions = {},
): () => void {
  const ttlMinutes = options.ttlMinutes ?? config.SESSION_TTL_MINUTES;
  const intervalSeconds = options.intervalSeconds ?? config.SESSION_SWEEP_INTERVAL_SECONDS;
  const clock = options.clock ?? systemClock;

  const timer = setInterval(() => {
    try {
      scanAndExpire(store, ttlMinutes, clock);
    } catch (err) {
      logger.error('[timeout] sweep failed', { err });
    }
  }, intervalSeconds * 1000);
  timer.unref();

  logger.debug('[timeout] session sweeper started', { ttlMinutes, intervalSeconds });
  return () => clearInterval(timer);
}
