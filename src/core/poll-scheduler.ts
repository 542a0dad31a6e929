/**
 * Poll Scheduler - one user's monitor loop
 *
 * States: idle → authenticating → polling → (backoff | polling) → cancelled.
 *
 * Each cycle logs in (idempotent), loads the results view, applies filters,
 * parses slots and passes matches through the NotificationGate. Cycles run
 * strictly in sequence. Cancellation is cooperative: the signal is checked
 * after every awaited browser operation and interrupts sleeps.
 *
 * Only InitError ends the loop early; every other failure is recorded as a
 * failed monitoring check and answered with a capped backoff.
 */

import type {
  AppointmentSlot,
  CheckFailureKind,
  Credentials,
  CycleOutcome,
  FilterSpec,
  MonitorExit,
  MonitorState,
  MonitoringStore,
  Notifier,
  UserId,
} from '../types/index.js';
import { AuthError, InitError, NavigationError, errorMessage } from '../utils/errors.js';
import { logger, type Logger } from '../utils/logger.js';
import { TIMEOUTS, sleep as abortableSleep } from '../utils/timeouts.js';
import type { ResultsView } from './authenticated-session.js';
import type { SlotExtractor } from './appointment-extractor.js';
import { slotMatchesFilter } from './filter-spec.js';
import type { NotificationGate } from './notification-gate.js';

/**
 * What the scheduler needs from a session. AuthenticatedSession implements it.
 */
export interface MonitorSession extends ResultsView {
  readonly isAuthenticated: boolean;
  open(): Promise<void>;
  login(credentials: Credentials): Promise<void>;
  navigate(url: string): Promise<void>;
  close(): Promise<void>;
}

export interface BackoffPolicy {
  pollIntervalMs: number;
  navigationBackoffMs: number;
  /** AuthError backoff = pollInterval × this */
  authBackoffMultiplier: number;
  /** No delay exceeds pollInterval × this */
  backoffCeilingMultiplier: number;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  pollIntervalMs: TIMEOUTS.POLL_INTERVAL,
  navigationBackoffMs: TIMEOUTS.NAVIGATION_BACKOFF,
  authBackoffMultiplier: 5,
  backoffCeilingMultiplier: 10,
};

/**
 * Delay after the n-th consecutive failure: the kind's base delay doubled per
 * repeat, never above the ceiling.
 */
export function computeBackoffDelay(
  kind: CheckFailureKind,
  consecutiveFailures: number,
  policy: BackoffPolicy
): number {
  const base = kind === 'auth'
    ? policy.pollIntervalMs * policy.authBackoffMultiplier
    : policy.navigationBackoffMs;
  const ceiling = policy.pollIntervalMs * policy.backoffCeilingMultiplier;
  const doublings = Math.min(Math.max(0, consecutiveFailures - 1), 30);
  return Math.min(base * 2 ** doublings, ceiling);
}

export interface PollSchedulerOptions {
  userId: UserId;
  filter: FilterSpec;
  credentials: Credentials;
  resultsUrl: string;
  session: MonitorSession;
  extractor: SlotExtractor;
  gate: NotificationGate;
  notifier: Notifier;
  store: MonitoringStore;
  policy?: Partial<BackoffPolicy>;
  /** Injected for tests; must resolve early when the signal aborts */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  /** Called after every completed cycle with the delay before the next one */
  onCycle?: (outcome: CycleOutcome, nextDelayMs: number) => void;
}

export class PollScheduler {
  private currentState: MonitorState = 'idle';
  private consecutiveFailures = 0;
  private completedCycles = 0;
  private lastCycle: { outcome: CycleOutcome; nextDelayMs: number } | null = null;
  private readonly policy: BackoffPolicy;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly log: Logger;

  constructor(private options: PollSchedulerOptions) {
    this.policy = { ...DEFAULT_BACKOFF_POLICY, ...options.policy };
    this.sleep = options.sleep ?? abortableSleep;
    this.log = logger.scheduler.child({ userId: options.userId });
  }

  get state(): MonitorState {
    return this.currentState;
  }

  get cycles(): number {
    return this.completedCycles;
  }

  /** Most recent completed cycle, for status reporting */
  get lastOutcome(): { outcome: CycleOutcome; nextDelayMs: number } | null {
    return this.lastCycle;
  }

  /**
   * Run until `signal` aborts or an InitError occurs. The session is closed
   * on every exit path. A scheduler runs once.
   */
  async run(signal: AbortSignal): Promise<MonitorExit> {
    if (this.currentState !== 'idle') {
      throw new Error(`PollScheduler for ${this.options.userId} has already run`);
    }
    const { session } = this.options;

    try {
      this.transition('authenticating');
      await session.open();

      while (!signal.aborted) {
        const outcome = await this.runCycle(signal);
        if (!outcome) {
          break;
        }
        this.completedCycles++;
        await this.recordCheck(outcome);

        const delay = this.delayAfter(outcome);
        this.transition(outcome.ok ? 'polling' : 'backoff');
        this.lastCycle = { outcome, nextDelayMs: delay };
        this.options.onCycle?.(outcome, delay);
        this.log.debug('Next cycle scheduled', { delayMs: delay, cycle: this.completedCycles });

        await this.sleep(delay, signal);
      }

      this.log.info('Monitor cancelled', { cycles: this.completedCycles });
      return { reason: 'cancelled', cycles: this.completedCycles };
    } catch (error) {
      this.log.error('Monitor stopped by fatal error', { error });
      return { reason: 'failed', cycles: this.completedCycles, error: errorMessage(error) };
    } finally {
      await session.close();
      this.transition('cancelled');
    }
  }

  /**
   * One cycle. Returns null when cancelled part-way.
   *
   * @throws InitError
   */
  private async runCycle(signal: AbortSignal): Promise<CycleOutcome | null> {
    const { session, extractor, filter, gate, userId } = this.options;
    const startTime = Date.now();

    try {
      if (!session.isAuthenticated) {
        this.transition('authenticating');
        await session.login(this.options.credentials);
        if (signal.aborted) return null;
      }

      this.transition('polling');
      await session.navigate(this.options.resultsUrl);
      if (signal.aborted) return null;

      await extractor.applyFilters(session, filter);
      if (signal.aborted) return null;

      const parsed = await extractor.parseResults(session, filter);
      if (signal.aborted) return null;

      const matching = parsed.filter((slot) => slotMatchesFilter(slot, filter));
      const admitted = gate.admit(userId, matching);
      if (admitted.length > 0) {
        await this.deliver(admitted);
      }

      this.log.timed('Cycle complete', startTime, {
        parsed: parsed.length,
        matching: matching.length,
        admitted: admitted.length,
      });
      return { ok: true, slotsFound: matching.length, admitted: admitted.length };
    } catch (error) {
      if (error instanceof InitError) {
        throw error;
      }
      const kind: CheckFailureKind = error instanceof AuthError
        ? 'auth'
        : error instanceof NavigationError
          ? 'navigation'
          : 'unexpected';

      if (kind === 'unexpected') {
        this.log.error('Cycle failed unexpectedly', { error });
      } else {
        this.log.warn('Cycle failed', { kind, error: errorMessage(error) });
      }
      return { ok: false, kind, message: errorMessage(error) };
    }
  }

  private async deliver(slots: AppointmentSlot[]): Promise<void> {
    const { notifier, store, userId } = this.options;
    try {
      await notifier.notify(userId, slots);
    } catch (error) {
      this.log.error('Notification delivery failed', { error, slots: slots.length });
    }
    await this.persist('logAppointmentsFound', () => store.logAppointmentsFound(userId, slots));
  }

  private async recordCheck(outcome: CycleOutcome): Promise<void> {
    const { store, userId } = this.options;
    const check = outcome.ok
      ? { appointmentsFound: outcome.slotsFound, success: true }
      : { appointmentsFound: 0, success: false, errorMessage: `${outcome.kind}: ${outcome.message}` };
    await this.persist('logMonitoringCheck', () => store.logMonitoringCheck(userId, check));
  }

  /**
   * Storage failures never reach the poll loop.
   */
  private async persist(operation: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      this.log.warn('Persistence failed', { operation, error: errorMessage(error) });
    }
  }

  private delayAfter(outcome: CycleOutcome): number {
    if (outcome.ok) {
      this.consecutiveFailures = 0;
      return this.policy.pollIntervalMs;
    }
    this.consecutiveFailures++;
    return computeBackoffDelay(outcome.kind, this.consecutiveFailures, this.policy);
  }

  private transition(next: MonitorState): void {
    if (this.currentState === next) {
      return;
    }
    this.log.debug('State change', { from: this.currentState, state: next });
    this.currentState = next;
  }
}
