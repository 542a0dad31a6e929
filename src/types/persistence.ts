/**
 * Persistence collaborator contract
 */

import type { AppointmentSlot, DateRange, UserId } from './monitor.js';

/**
 * Raw per-user preferences as stored. Validated into a FilterSpec before use.
 */
export interface UserSettings {
  centers?: string[];
  dateRange?: DateRange;
  timePreferences?: string[];
  notifications?: boolean;
}

export interface MonitoringCheck {
  appointmentsFound: number;
  success: boolean;
  errorMessage?: string;
}

export interface UserStats {
  sessions: number;
  totalChecks: number;
  appointmentsFound: number;
  /** ISO timestamp of the latest monitoring check, or null */
  lastActivity: string | null;
  /** Checks in the last 7 days */
  recentChecks: number;
  failedChecks: number;
  /** Latest failed check, or null when every check succeeded */
  lastFailure: { at: string; message: string } | null;
}

export interface GlobalStats {
  totalUsers: number;
  appointmentsToday: number;
  activeSessions: number;
}

export interface CleanupResult {
  checksRemoved: number;
  appointmentsRemoved: number;
}

/**
 * Storage for users, monitor sessions and check history.
 *
 * Implementations raise PersistenceError on storage failure; callers in the
 * poll loop log and swallow it.
 */
export interface MonitoringStore {
  /** Insert or reactivate a user. */
  addUser(userId: UserId, username: string): Promise<void>;
  /** Stored settings, or `{}` for an unknown user. */
  getUserSettings(userId: UserId): Promise<UserSettings>;
  /** Merge `settings` into the stored object. False when the user does not exist. */
  updateUserSettings(userId: UserId, settings: UserSettings): Promise<boolean>;
  /** Open a monitor session row; returns its id, or null for an unknown user. */
  logMonitorStart(userId: UserId): Promise<number | null>;
  /** Close the open session row. False when none is open. */
  logMonitorStop(userId: UserId): Promise<boolean>;
  logAppointmentsFound(userId: UserId, slots: readonly AppointmentSlot[]): Promise<boolean>;
  logMonitoringCheck(userId: UserId, check: MonitoringCheck): Promise<boolean>;
  /** Null for an unknown user. */
  getUserStats(userId: UserId): Promise<UserStats | null>;
  getGlobalStats(): Promise<GlobalStats>;
  cleanupOlderThan(days: number): Promise<CleanupResult>;
  close(): void;
}
