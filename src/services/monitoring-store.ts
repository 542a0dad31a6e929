/**
 * SQLite Monitoring Store
 *
 * better-sqlite3 implementation of MonitoringStore. Holds users and their
 * settings, monitor sessions, found appointments and the per-cycle check log.
 *
 * Schema:
 * - users: one row per chat user, settings as a JSON object
 * - monitor_sessions: one row per started monitor; open while ended_at is NULL
 * - appointment_logs: every admitted slot
 * - monitoring_checks: one row per completed poll cycle
 *
 * Timestamps are epoch milliseconds.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import type {
  AppointmentSlot,
  CleanupResult,
  GlobalStats,
  MonitoringCheck,
  MonitoringStore,
  UserId,
  UserSettings,
  UserStats,
} from '../types/index.js';
import { DAY_MS, startOfUtcDay } from '../utils/dates.js';
import { PersistenceError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.store;

export interface SqliteStoreConfig {
  /** Database file, or `:memory:` */
  dbPath: string;
  /** WAL journal; ignored for in-memory databases */
  walMode: boolean;
}

export const DEFAULT_SQLITE_STORE_CONFIG: SqliteStoreConfig = {
  dbPath: './data/slot-monitor.db',
  walMode: true,
};

const RECENT_WINDOW_DAYS = 7;

const storedSettingsSchema = z.object({
  centers: z.array(z.string()).optional(),
  dateRange: z.object({ start: z.string(), end: z.string() }).optional(),
  timePreferences: z.array(z.string()).optional(),
  notifications: z.boolean().optional(),
});

interface UserRow {
  user_id: string;
  settings: string;
}

interface SessionRow {
  id: number;
  started_at: number;
}

interface SessionTotalsRow {
  sessions: number;
  checks: number | null;
  appointments: number | null;
}

interface CountRow {
  count: number;
}

interface LastCheckRow {
  checked_at: number | null;
}

interface FailedCheckRow {
  checked_at: number;
  error_message: string | null;
}

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS users (
    user_id TEXT PRIMARY KEY,
    username TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 1,
    settings TEXT NOT NULL DEFAULT '{}'
  );

  CREATE TABLE IF NOT EXISTS monitor_sessions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    started_at INTEGER NOT NULL,
    ended_at INTEGER,
    duration_minutes INTEGER,
    checks_performed INTEGER NOT NULL DEFAULT 0,
    appointments_found INTEGER NOT NULL DEFAULT 0
  );

  CREATE INDEX IF NOT EXISTS idx_monitor_sessions_user
    ON monitor_sessions(user_id, ended_at);

  CREATE TABLE IF NOT EXISTS appointment_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    session_id INTEGER,
    appointment_data TEXT NOT NULL,
    found_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_appointment_logs_found_at
    ON appointment_logs(found_at);

  CREATE TABLE IF NOT EXISTS monitoring_checks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    session_id INTEGER,
    checked_at INTEGER NOT NULL,
    appointments_found INTEGER NOT NULL DEFAULT 0,
    success INTEGER NOT NULL DEFAULT 1,
    error_message TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_monitoring_checks_user_time
    ON monitoring_checks(user_id, checked_at);
`;

export class SqliteMonitoringStore implements MonitoringStore {
  private config: SqliteStoreConfig;
  private db: Database.Database | null = null;

  constructor(
    config: Partial<SqliteStoreConfig> = {},
    private now: () => number = Date.now
  ) {
    this.config = { ...DEFAULT_SQLITE_STORE_CONFIG, ...config };
  }

  /**
   * Open the database and create the schema. Must be called before use.
   *
   * @throws PersistenceError
   */
  async initialize(): Promise<void> {
    if (this.db) {
      return;
    }

    const inMemory = this.config.dbPath === ':memory:';
    try {
      if (!inMemory) {
        await fs.mkdir(path.dirname(this.config.dbPath), { recursive: true });
      }
      const db = new Database(this.config.dbPath);
      if (this.config.walMode && !inMemory) {
        db.pragma('journal_mode = WAL');
      }
      db.pragma('synchronous = NORMAL');
      db.exec(SCHEMA_SQL);
      this.db = db;
      log.info('SQLite store initialized', { dbPath: this.config.dbPath });
    } catch (error) {
      throw new PersistenceError(
        `Failed to open database at ${this.config.dbPath}: ${errorMessage(error)}`,
        'initialize',
        { cause: error }
      );
    }
  }

  async addUser(userId: UserId, username: string): Promise<void> {
    this.execute('addUser', (db) => {
      db.prepare<[string, string, number]>(
        `INSERT INTO users (user_id, username, created_at, settings)
         VALUES (?, ?, ?, '{}')
         ON CONFLICT(user_id) DO UPDATE SET username = excluded.username, is_active = 1`
      ).run(userId, username, this.now());
    });
    log.debug('User registered', { userId });
  }

  async getUserSettings(userId: UserId): Promise<UserSettings> {
    const row = this.execute('getUserSettings', (db) => this.findUser(db, userId));
    return row ? this.decodeSettings(userId, row.settings) : {};
  }

  async updateUserSettings(userId: UserId, settings: UserSettings): Promise<boolean> {
    return this.execute('updateUserSettings', (db) => {
      const row = this.findUser(db, userId);
      if (!row) {
        log.warn('Settings update for unknown user', { userId });
        return false;
      }
      const merged: UserSettings = { ...this.decodeSettings(userId, row.settings), ...settings };
      db.prepare<[string, string]>('UPDATE users SET settings = ? WHERE user_id = ?')
        .run(JSON.stringify(merged), userId);
      return true;
    });
  }

  async logMonitorStart(userId: UserId): Promise<number | null> {
    return this.execute('logMonitorStart', (db) => {
      if (!this.findUser(db, userId)) {
        log.warn('Monitor start for unknown user', { userId });
        return null;
      }
      const result = db.prepare<[string, number]>(
        'INSERT INTO monitor_sessions (user_id, started_at) VALUES (?, ?)'
      ).run(userId, this.now());
      return Number(result.lastInsertRowid);
    });
  }

  async logMonitorStop(userId: UserId): Promise<boolean> {
    return this.execute('logMonitorStop', (db) => {
      const session = this.findActiveSession(db, userId);
      if (!session) {
        log.warn('No open monitor session', { userId });
        return false;
      }
      const endedAt = this.now();
      const durationMinutes = Math.floor((endedAt - session.started_at) / 60000);
      db.prepare<[number, number, number]>(
        'UPDATE monitor_sessions SET ended_at = ?, duration_minutes = ? WHERE id = ?'
      ).run(endedAt, durationMinutes, session.id);
      return true;
    });
  }

  async logAppointmentsFound(userId: UserId, slots: readonly AppointmentSlot[]): Promise<boolean> {
    return this.execute('logAppointmentsFound', (db) => {
      if (!this.findUser(db, userId)) {
        return false;
      }
      const session = this.findActiveSession(db, userId);
      const foundAt = this.now();
      const insert = db.prepare<[string, number | null, string, number]>(
        'INSERT INTO appointment_logs (user_id, session_id, appointment_data, found_at) VALUES (?, ?, ?, ?)'
      );

      db.transaction(() => {
        for (const slot of slots) {
          insert.run(userId, session?.id ?? null, JSON.stringify(slot), foundAt);
        }
        if (session) {
          db.prepare<[number, number]>(
            'UPDATE monitor_sessions SET appointments_found = appointments_found + ? WHERE id = ?'
          ).run(slots.length, session.id);
        }
      })();
      return true;
    });
  }

  async logMonitoringCheck(userId: UserId, check: MonitoringCheck): Promise<boolean> {
    return this.execute('logMonitoringCheck', (db) => {
      if (!this.findUser(db, userId)) {
        return false;
      }
      const session = this.findActiveSession(db, userId);

      db.transaction(() => {
        db.prepare<[string, number | null, number, number, number, string | null]>(
          `INSERT INTO monitoring_checks
             (user_id, session_id, checked_at, appointments_found, success, error_message)
           VALUES (?, ?, ?, ?, ?, ?)`
        ).run(
          userId,
          session?.id ?? null,
          this.now(),
          check.appointmentsFound,
          check.success ? 1 : 0,
          check.errorMessage ?? null
        );
        if (session) {
          db.prepare<[number]>(
            'UPDATE monitor_sessions SET checks_performed = checks_performed + 1 WHERE id = ?'
          ).run(session.id);
        }
      })();
      return true;
    });
  }

  async getUserStats(userId: UserId): Promise<UserStats | null> {
    return this.execute('getUserStats', (db) => {
      if (!this.findUser(db, userId)) {
        return null;
      }
      const totals = db.prepare<[string], SessionTotalsRow>(
        `SELECT COUNT(*) AS sessions,
                SUM(checks_performed) AS checks,
                SUM(appointments_found) AS appointments
           FROM monitor_sessions WHERE user_id = ?`
      ).get(userId);
      const lastCheck = db.prepare<[string], LastCheckRow>(
        'SELECT MAX(checked_at) AS checked_at FROM monitoring_checks WHERE user_id = ?'
      ).get(userId);
      const recent = db.prepare<[string, number], CountRow>(
        'SELECT COUNT(*) AS count FROM monitoring_checks WHERE user_id = ? AND checked_at >= ?'
      ).get(userId, this.now() - RECENT_WINDOW_DAYS * DAY_MS);
      const failed = db.prepare<[string], CountRow>(
        'SELECT COUNT(*) AS count FROM monitoring_checks WHERE user_id = ? AND success = 0'
      ).get(userId);
      const lastFailure = db.prepare<[string], FailedCheckRow>(
        `SELECT checked_at, error_message FROM monitoring_checks
          WHERE user_id = ? AND success = 0
          ORDER BY checked_at DESC, id DESC LIMIT 1`
      ).get(userId);

      const lastActivity = lastCheck?.checked_at ?? null;
      return {
        sessions: totals?.sessions ?? 0,
        totalChecks: totals?.checks ?? 0,
        appointmentsFound: totals?.appointments ?? 0,
        lastActivity: lastActivity === null ? null : new Date(lastActivity).toISOString(),
        recentChecks: recent?.count ?? 0,
        failedChecks: failed?.count ?? 0,
        lastFailure: lastFailure
          ? {
              at: new Date(lastFailure.checked_at).toISOString(),
              message: lastFailure.error_message ?? 'unknown error',
            }
          : null,
      };
    });
  }

  async getGlobalStats(): Promise<GlobalStats> {
    return this.execute('getGlobalStats', (db) => {
      const users = db.prepare<[], CountRow>(
        'SELECT COUNT(*) AS count FROM users WHERE is_active = 1'
      ).get();
      const today = db.prepare<[number], CountRow>(
        'SELECT COUNT(*) AS count FROM appointment_logs WHERE found_at >= ?'
      ).get(startOfUtcDay(this.now()));
      const active = db.prepare<[], CountRow>(
        'SELECT COUNT(*) AS count FROM monitor_sessions WHERE ended_at IS NULL'
      ).get();

      return {
        totalUsers: users?.count ?? 0,
        appointmentsToday: today?.count ?? 0,
        activeSessions: active?.count ?? 0,
      };
    });
  }

  async cleanupOlderThan(days: number): Promise<CleanupResult> {
    const result = this.execute('cleanupOlderThan', (db) => {
      const cutoff = this.now() - days * DAY_MS;
      return db.transaction((): CleanupResult => ({
        checksRemoved: db.prepare<[number]>('DELETE FROM monitoring_checks WHERE checked_at < ?')
          .run(cutoff).changes,
        appointmentsRemoved: db.prepare<[number]>('DELETE FROM appointment_logs WHERE found_at < ?')
          .run(cutoff).changes,
      }))();
    });
    log.info('Cleaned up old data', { days, ...result });
    return result;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      log.debug('SQLite store closed');
    }
  }

  private findUser(db: Database.Database, userId: UserId): UserRow | undefined {
    return db.prepare<[string], UserRow>('SELECT user_id, settings FROM users WHERE user_id = ?')
      .get(userId);
  }

  private findActiveSession(db: Database.Database, userId: UserId): SessionRow | undefined {
    return db.prepare<[string], SessionRow>(
      `SELECT id, started_at FROM monitor_sessions
        WHERE user_id = ? AND ended_at IS NULL
        ORDER BY id DESC LIMIT 1`
    ).get(userId);
  }

  private decodeSettings(userId: UserId, raw: string): UserSettings {
    try {
      const parsed = storedSettingsSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
      log.warn('Stored settings failed validation', { userId });
    } catch (error) {
      log.warn('Stored settings are not valid JSON', { userId, error: errorMessage(error) });
    }
    return {};
  }

  /**
   * Run a database operation, wrapping failures in PersistenceError.
   */
  private execute<T>(operation: string, fn: (db: Database.Database) => T): T {
    if (!this.db) {
      throw new PersistenceError('Store not initialized. Call initialize() first.', operation);
    }
    try {
      return fn(this.db);
    } catch (error) {
      log.error('Database operation failed', { operation, error });
      throw new PersistenceError(`${operation} failed: ${errorMessage(error)}`, operation, { cause: error });
    }
  }
}
