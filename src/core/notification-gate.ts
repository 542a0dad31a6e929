/**
 * Notification Gate
 *
 * The booking site re-renders the same unbooked slot on every poll. The gate
 * lets a (user, slot) pair through at most once per cooldown window. All
 * methods are synchronous, so concurrent monitors never observe a torn table.
 */

import type { AppointmentSlot, UserId } from '../types/index.js';
import { toIsoDate } from '../utils/dates.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';

export interface NotificationRecord {
  userId: UserId;
  key: string;
  /** Slot date, used for eviction once it has passed */
  slotDate: string;
  lastNotifiedAt: number;
}

export interface NotificationGateConfig {
  cooldownMs: number;
  /** Records older than this are evicted regardless of slot date */
  retentionMs: number;
}

const DEFAULT_CONFIG: NotificationGateConfig = {
  cooldownMs: TIMEOUTS.NOTIFICATION_COOLDOWN,
  retentionMs: 30 * 24 * 60 * 60 * 1000,
};

/**
 * Identity key of a slot: centre, date, time and test type
 */
export function slotIdentityKey(slot: AppointmentSlot): string {
  return [slot.center, slot.date, slot.time, slot.testType].join('|');
}

export class NotificationGate {
  private records: Map<UserId, Map<string, NotificationRecord>> = new Map();
  private config: NotificationGateConfig;

  constructor(
    config: Partial<NotificationGateConfig> = {},
    private now: () => number = Date.now
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Return the slots to notify on and record them as notified.
   */
  admit(userId: UserId, slots: readonly AppointmentSlot[]): AppointmentSlot[] {
    const now = this.now();
    let userRecords = this.records.get(userId);
    if (!userRecords) {
      userRecords = new Map();
      this.records.set(userId, userRecords);
    }

    const admitted: AppointmentSlot[] = [];
    for (const slot of slots) {
      const key = slotIdentityKey(slot);
      const existing = userRecords.get(key);
      if (existing && now - existing.lastNotifiedAt < this.config.cooldownMs) {
        continue;
      }
      userRecords.set(key, { userId, key, slotDate: slot.date, lastNotifiedAt: now });
      admitted.push(slot);
    }

    if (admitted.length < slots.length) {
      logger.gate.debug('Suppressed repeat slots', {
        userId,
        suppressed: slots.length - admitted.length,
      });
    }
    return admitted;
  }

  /**
   * Drop records whose slot date has passed or that exceed the retention window.
   *
   * @returns number of records removed
   */
  evictExpired(): number {
    const now = this.now();
    const today = toIsoDate(new Date(now));
    let removed = 0;

    for (const [userId, userRecords] of this.records) {
      for (const [key, record] of userRecords) {
        if (record.slotDate < today || now - record.lastNotifiedAt > this.config.retentionMs) {
          userRecords.delete(key);
          removed++;
        }
      }
      if (userRecords.size === 0) {
        this.records.delete(userId);
      }
    }

    if (removed > 0) {
      logger.gate.info('Evicted notification records', { removed });
    }
    return removed;
  }

  getRecord(userId: UserId, slot: AppointmentSlot): NotificationRecord | undefined {
    return this.records.get(userId)?.get(slotIdentityKey(slot));
  }

  size(): number {
    let total = 0;
    for (const userRecords of this.records.values()) {
      total += userRecords.size;
    }
    return total;
  }
}
