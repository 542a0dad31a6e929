/**
 * Central Timeout Configuration
 *
 * Default timing values in milliseconds and the conversion from the
 * seconds-based environment configuration.
 */

import type { MonitorConfig } from './config-schemas.js';

export const TIMEOUTS = {
  /**
   * Bounded wait for a single browser action (navigation, selector, click)
   */
  BOUNDED_WAIT: 30000,

  /**
   * Delay between successful poll cycles
   */
  POLL_INTERVAL: 300000,

  /**
   * Base backoff after a navigation failure
   */
  NAVIGATION_BACKOFF: 60000,

  /**
   * Minimum time between repeat notifications for the same slot
   */
  NOTIFICATION_COOLDOWN: 300000,

  /**
   * HTTP delivery timeout for notifier requests
   */
  NOTIFY_REQUEST: 30000,

  /**
   * How long a Telegram getUpdates call is held open waiting for commands
   */
  UPDATES_LONG_POLL: 30000,

  /**
   * Interval between retention sweeps
   */
  RETENTION_SWEEP: 24 * 60 * 60 * 1000,
} as const;

export type TimeoutKey = keyof typeof TIMEOUTS;

export function getTimeout(key: TimeoutKey, override?: number): number {
  return override ?? TIMEOUTS[key];
}

/**
 * Resolved monitor timings, all in milliseconds
 */
export interface MonitorTimings {
  pollIntervalMs: number;
  boundedWaitMs: number;
  navigationBackoffMs: number;
  authBackoffMultiplier: number;
  backoffCeilingMultiplier: number;
  notificationCooldownMs: number;
  retentionMs: number;
}

export function resolveMonitorTimings(config: MonitorConfig): MonitorTimings {
  return {
    pollIntervalMs: config.pollIntervalSeconds * 1000,
    boundedWaitMs: config.boundedWaitSeconds * 1000,
    navigationBackoffMs: config.navigationBackoffSeconds * 1000,
    authBackoffMultiplier: config.authBackoffMultiplier,
    backoffCeilingMultiplier: config.backoffCeilingMultiplier,
    notificationCooldownMs: config.notificationCooldownSeconds * 1000,
    retentionMs: config.retentionDays * 24 * 60 * 60 * 1000,
  };
}

/**
 * Sleep that resolves early when `signal` aborts. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
