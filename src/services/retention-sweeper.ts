/**
 * Retention Sweeper
 *
 * Periodically deletes old check and appointment history from the store and
 * evicts expired NotificationGate records.
 */

import type { NotificationGate } from '../core/notification-gate.js';
import type { CleanupResult, MonitoringStore } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { getTimeout } from '../utils/timeouts.js';

const log = logger.retention;

export interface RetentionSweeperOptions {
  store: MonitoringStore;
  gate: NotificationGate;
  retentionDays: number;
  /** Defaults to one day */
  intervalMs?: number;
}

export interface SweepResult extends CleanupResult {
  gateRecordsEvicted: number;
}

export class RetentionSweeper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private sweeping: Promise<SweepResult | null> | null = null;

  constructor(private options: RetentionSweeperOptions) {}

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    const intervalMs = getTimeout('RETENTION_SWEEP', this.options.intervalMs);
    this.timer = setInterval(() => {
      void this.sweep();
    }, intervalMs);
    this.timer.unref();
    log.info('Retention sweeper started', { intervalMs, retentionDays: this.options.retentionDays });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Run one sweep. Overlapping calls share the sweep in progress.
   * Resolves to null when the store cleanup failed.
   */
  sweep(): Promise<SweepResult | null> {
    this.sweeping ??= this.runSweep().finally(() => {
      this.sweeping = null;
    });
    return this.sweeping;
  }

  private async runSweep(): Promise<SweepResult | null> {
    const gateRecordsEvicted = this.options.gate.evictExpired();
    try {
      const cleanup = await this.options.store.cleanupOlderThan(this.options.retentionDays);
      return { ...cleanup, gateRecordsEvicted };
    } catch (error) {
      log.error('Retention sweep failed', { error: errorMessage(error), gateRecordsEvicted });
      return null;
    }
  }
}
