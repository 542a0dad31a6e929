/**
 * Monitor Registry
 *
 * Owns the user → running monitor table. At most one monitor per user; the
 * check-and-insert in start() happens before any await, so two concurrent
 * starts for the same user cannot both succeed.
 */

import type {
  CycleOutcome,
  FilterSpec,
  MonitorExit,
  MonitorState,
  MonitoringStore,
  UserId,
} from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.registry;

/**
 * A runnable monitor. PollScheduler implements it.
 */
export interface MonitorTask {
  readonly state: MonitorState;
  readonly cycles: number;
  readonly lastOutcome: { outcome: CycleOutcome; nextDelayMs: number } | null;
  run(signal: AbortSignal): Promise<MonitorExit>;
}

export type MonitorTaskFactory = (userId: UserId, filter: FilterSpec) => MonitorTask;

/**
 * Read-only view of a running monitor
 */
export class MonitorHandle {
  constructor(
    readonly userId: UserId,
    readonly filter: FilterSpec,
    readonly startedAt: number,
    readonly done: Promise<MonitorExit>,
    private task: MonitorTask
  ) {}

  get state(): MonitorState {
    return this.task.state;
  }

  get cycles(): number {
    return this.task.cycles;
  }

  get lastOutcome(): CycleOutcome | null {
    return this.task.lastOutcome?.outcome ?? null;
  }

  get nextDelayMs(): number | null {
    return this.task.lastOutcome?.nextDelayMs ?? null;
  }
}

export type StartResult =
  | { success: true; handle: MonitorHandle }
  | { success: false; reason: 'already_running' };

export type StopResult =
  | { success: true; exit: MonitorExit }
  | { success: false; reason: 'not_running' };

interface RunningMonitor {
  handle: MonitorHandle;
  controller: AbortController;
  /** Store session row id; resolves to null when logging failed */
  sessionId: Promise<number | null>;
  stopping?: Promise<StopResult>;
}

/**
 * How a user's last monitor ended when it was not stopped on request
 */
export interface FailedMonitor {
  error: string;
  cycles: number;
  endedAt: number;
}

export class MonitorRegistry {
  private monitors: Map<UserId, RunningMonitor> = new Map();
  private failures: Map<UserId, FailedMonitor> = new Map();

  constructor(
    private createTask: MonitorTaskFactory,
    private store: MonitoringStore,
    private now: () => number = Date.now
  ) {}

  start(userId: UserId, filter: FilterSpec): StartResult {
    if (this.monitors.has(userId)) {
      return { success: false, reason: 'already_running' };
    }

    this.failures.delete(userId);
    const task = this.createTask(userId, filter);
    const controller = new AbortController();
    const sessionId = this.safely('logMonitorStart', () => this.store.logMonitorStart(userId), null);
    const done = task.run(controller.signal).catch((error: unknown): MonitorExit => ({
      reason: 'failed',
      cycles: task.cycles,
      error: errorMessage(error),
    }));
    const handle = new MonitorHandle(userId, filter, this.now(), done, task);
    const entry: RunningMonitor = { handle, controller, sessionId };
    this.monitors.set(userId, entry);

    void done.then((exit) => this.onTaskExit(entry, exit));

    log.info('Monitor started', { userId, centers: filter.centers });
    return { success: true, handle };
  }

  /**
   * Cancel a user's monitor and wait until its session is closed.
   * Concurrent calls share one wait.
   */
  stop(userId: UserId): Promise<StopResult> {
    const entry = this.monitors.get(userId);
    if (!entry) {
      return Promise.resolve({ success: false, reason: 'not_running' });
    }
    entry.stopping ??= this.finishStop(entry);
    return entry.stopping;
  }

  async stopAll(): Promise<void> {
    const userIds = [...this.monitors.keys()];
    await Promise.all(userIds.map((userId) => this.stop(userId)));
    if (userIds.length > 0) {
      log.info('All monitors stopped', { count: userIds.length });
    }
  }

  isRunning(userId: UserId): boolean {
    return this.monitors.has(userId);
  }

  get(userId: UserId): MonitorHandle | undefined {
    return this.monitors.get(userId)?.handle;
  }

  /**
   * The fatal error that ended the user's last monitor, until the next start
   */
  lastFailure(userId: UserId): FailedMonitor | undefined {
    return this.failures.get(userId);
  }

  count(): number {
    return this.monitors.size;
  }

  list(): MonitorHandle[] {
    return [...this.monitors.values()].map((entry) => entry.handle);
  }

  private async finishStop(entry: RunningMonitor): Promise<StopResult> {
    const { userId } = entry.handle;
    entry.controller.abort();
    const exit = await entry.handle.done;
    this.remove(entry);
    await this.closeSessionLog(entry);
    log.info('Monitor stopped', { userId, cycles: exit.cycles });
    return { success: true, exit };
  }

  /**
   * A task that ended without stop() (fatal InitError) deregisters itself.
   * The error is kept for /status and written to the check history.
   */
  private async onTaskExit(entry: RunningMonitor, exit: MonitorExit): Promise<void> {
    if (entry.stopping || !this.remove(entry)) {
      return;
    }
    const { userId } = entry.handle;
    log.warn('Monitor ended on its own', { userId, exit });

    if (exit.reason === 'failed') {
      const { error } = exit;
      this.failures.set(userId, { error, cycles: exit.cycles, endedAt: this.now() });
      // after the session row exists, so the check is counted against it
      await entry.sessionId;
      await this.safely(
        'logMonitoringCheck',
        () => this.store.logMonitoringCheck(userId, { appointmentsFound: 0, success: false, errorMessage: error }),
        false
      );
    }
    await this.closeSessionLog(entry);
  }

  private remove(entry: RunningMonitor): boolean {
    const { userId } = entry.handle;
    if (this.monitors.get(userId) !== entry) {
      return false;
    }
    this.monitors.delete(userId);
    return true;
  }

  private async closeSessionLog(entry: RunningMonitor): Promise<void> {
    const sessionId = await entry.sessionId;
    if (sessionId !== null) {
      await this.safely('logMonitorStop', () => this.store.logMonitorStop(entry.handle.userId), false);
    }
  }

  private async safely<T>(operation: string, fn: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      log.warn('Persistence failed', { operation, error: errorMessage(error) });
      return fallback;
    }
  }
}
