import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { AppointmentExtractor } from '../../src/core/appointment-extractor.js';
import { AuthenticatedSession } from '../../src/core/authenticated-session.js';
import { NotificationGate } from '../../src/core/notification-gate.js';
import {
  DEFAULT_BACKOFF_POLICY,
  PollScheduler,
  computeBackoffDelay,
  type BackoffPolicy,
  type PollSchedulerOptions,
} from '../../src/core/poll-scheduler.js';
import type { CheckFailureKind, CycleOutcome, FilterSpec, Notifier } from '../../src/types/index.js';
import { FakeLauncher, FakePage, site, slotRow } from '../helpers/fake-browser.js';
import { RecordingStore } from '../helpers/recording-store.js';

const filter: FilterSpec = {
  centers: ['london'],
  dateRange: { start: '2025-07-01', end: '2025-07-31' },
  timePreferences: [],
};

/**
 * Sleep stand-in that records each delay and aborts after `cycles` of them.
 */
function stopAfter(controller: AbortController, cycles: number) {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
    if (delays.length >= cycles) {
      controller.abort();
    }
  };
  return { delays, sleep };
}

describe('computeBackoffDelay', () => {
  const policy: BackoffPolicy = {
    pollIntervalMs: 300_000,
    navigationBackoffMs: 60_000,
    authBackoffMultiplier: 5,
    backoffCeilingMultiplier: 10,
  };

  it('should start auth backoff at pollInterval times the multiplier', () => {
    expect(computeBackoffDelay('auth', 1, policy)).toBe(1_500_000);
  });

  it('should double navigation backoff per consecutive failure', () => {
    expect(computeBackoffDelay('navigation', 1, policy)).toBe(60_000);
    expect(computeBackoffDelay('navigation', 2, policy)).toBe(120_000);
    expect(computeBackoffDelay('navigation', 3, policy)).toBe(240_000);
  });

  it('should never exceed the ceiling', () => {
    const ceiling = policy.pollIntervalMs * policy.backoffCeilingMultiplier;
    const kinds: CheckFailureKind[] = ['auth', 'navigation', 'unexpected'];
    for (const kind of kinds) {
      for (let failures = 1; failures <= 100; failures++) {
        expect(computeBackoffDelay(kind, failures, policy)).toBeLessThanOrEqual(ceiling);
      }
    }
    expect(computeBackoffDelay('navigation', 100, policy)).toBe(ceiling);
  });
});

describe('PollScheduler', () => {
  let page: FakePage;
  let launcher: FakeLauncher;
  let store: RecordingStore;
  let gate: NotificationGate;
  let notify: Mock<Notifier['notify']>;
  let controller: AbortController;

  const createScheduler = (overrides: Partial<PollSchedulerOptions> = {}): PollScheduler =>
    new PollScheduler({
      userId: 'u1',
      filter,
      credentials: { username: 'learner', password: 'test-secret' },
      resultsUrl: site.resultsUrl,
      session: new AuthenticatedSession({ launcher, site, boundedWaitMs: 50, userId: 'u1' }),
      extractor: new AppointmentExtractor(site),
      gate,
      notifier: { notify },
      store,
      ...overrides,
    });

  beforeEach(() => {
    page = new FakePage();
    launcher = new FakeLauncher(page);
    store = new RecordingStore();
    gate = new NotificationGate({ cooldownMs: 300_000 }, () => Date.parse('2025-06-01T12:00:00Z'));
    notify = vi.fn<Notifier['notify']>().mockResolvedValue(undefined);
    controller = new AbortController();
  });

  it('should notify a new matching slot once across two cycles', async () => {
    page.slots = [
      slotRow('london', '2025-07-01', '09:30', 'car', 'https://booking.test/book/1'),
      slotRow('manchester', '2025-07-01', '10:00'),
    ];
    const { delays, sleep } = stopAfter(controller, 2);
    const outcomes: CycleOutcome[] = [];
    const scheduler = createScheduler({ sleep, onCycle: (outcome) => outcomes.push(outcome) });

    const exit = await scheduler.run(controller.signal);

    expect(exit).toEqual({ reason: 'cancelled', cycles: 2 });
    expect(outcomes).toEqual([
      { ok: true, slotsFound: 1, admitted: 1 },
      { ok: true, slotsFound: 1, admitted: 0 },
    ]);
    expect(notify).toHaveBeenCalledTimes(1);
    expect(notify).toHaveBeenCalledWith('u1', [
      {
        center: 'london',
        date: '2025-07-01',
        time: '09:30',
        testType: 'car',
        bookingUrl: 'https://booking.test/book/1',
      },
    ]);
    expect(store.appointments).toHaveLength(1);
    expect(store.checks).toEqual([
      { userId: 'u1', appointmentsFound: 1, success: true },
      { userId: 'u1', appointmentsFound: 1, success: true },
    ]);
    expect(delays).toEqual([DEFAULT_BACKOFF_POLICY.pollIntervalMs, DEFAULT_BACKOFF_POLICY.pollIntervalMs]);
  });

  it('should log in once and reuse the session between cycles', async () => {
    const { sleep } = stopAfter(controller, 3);

    await createScheduler({ sleep }).run(controller.signal);

    expect(page.calls.filter((call) => call === 'goto:https://booking.test/sign-in')).toHaveLength(1);
    expect(page.calls.filter((call) => call === 'goto:https://booking.test/appointments')).toHaveLength(3);
  });

  it('should release the session and end in the cancelled state', async () => {
    const { sleep } = stopAfter(controller, 1);
    const scheduler = createScheduler({ sleep });

    await scheduler.run(controller.signal);

    expect(scheduler.state).toBe('cancelled');
    expect(launcher.launches).toBe(1);
    expect(launcher.openHandles).toBe(0);
  });

  it('should back off with a capped, growing delay after auth failures', async () => {
    page.loginOutcome = 'rejected';
    const { delays, sleep } = stopAfter(controller, 3);

    await createScheduler({ sleep }).run(controller.signal);

    expect(delays).toEqual([1_500_000, 3_000_000, 3_000_000]);
    expect(store.checks[0]).toEqual({
      userId: 'u1',
      appointmentsFound: 0,
      success: false,
      errorMessage: 'auth: Login rejected: invalid credentials',
    });
  });

  it('should reset the backoff after a successful cycle', async () => {
    page.failures.set('goto:https://booking.test/appointments', new Error('Timeout 50ms exceeded'));
    const delays: number[] = [];
    const sleep = async (ms: number): Promise<void> => {
      delays.push(ms);
      if (delays.length === 2) {
        page.failures.clear();
      }
      if (delays.length === 3) {
        controller.abort();
      }
    };

    await createScheduler({ sleep }).run(controller.signal);

    expect(delays).toEqual([60_000, 120_000, DEFAULT_BACKOFF_POLICY.pollIntervalMs]);
    expect(store.checks.map((check) => check.success)).toEqual([false, false, true]);
  });

  it('should treat unexpected errors with the navigation delay', async () => {
    const { delays, sleep } = stopAfter(controller, 1);
    const extractor = {
      applyFilters: async () => [],
      parseResults: async () => {
        throw new TypeError('cannot read properties of undefined');
      },
    };

    await createScheduler({ sleep, extractor }).run(controller.signal);

    expect(delays).toEqual([60_000]);
    expect(store.checks[0]?.errorMessage).toBe('unexpected: cannot read properties of undefined');
  });

  it('should end with a failed exit when the browser cannot start', async () => {
    launcher.failWith = new Error('no chromium');
    const sleep = vi.fn(async () => {});

    const exit = await createScheduler({ sleep }).run(controller.signal);

    expect(exit).toEqual({ reason: 'failed', cycles: 0, error: 'Browser could not be started: no chromium' });
    expect(sleep).not.toHaveBeenCalled();
    expect(store.checks).toEqual([]);
  });

  it('should keep polling when notification delivery fails', async () => {
    page.slots = [slotRow('london', '2025-07-02', '11:00')];
    notify.mockRejectedValue(new Error('telegram unavailable'));
    const { sleep } = stopAfter(controller, 2);

    const exit = await createScheduler({ sleep }).run(controller.signal);

    expect(exit.cycles).toBe(2);
    expect(store.appointments).toHaveLength(1);
  });

  it('should keep polling when persistence fails', async () => {
    store.failing.add('logMonitoringCheck');
    const { sleep } = stopAfter(controller, 2);

    const exit = await createScheduler({ sleep }).run(controller.signal);

    expect(exit).toEqual({ reason: 'cancelled', cycles: 2 });
  });

  it('should stop without another check when cancelled mid-cycle', async () => {
    page.slots = [slotRow('london', '2025-07-03', '15:00')];
    const sleep = vi.fn(async () => {});
    const extractor = {
      applyFilters: async () => {
        controller.abort();
        return [];
      },
      parseResults: vi.fn(async () => []),
    };

    const exit = await createScheduler({ sleep, extractor }).run(controller.signal);

    expect(exit).toEqual({ reason: 'cancelled', cycles: 0 });
    expect(extractor.parseResults).not.toHaveBeenCalled();
    expect(store.checks).toEqual([]);
    expect(launcher.openHandles).toBe(0);
  });

  it('should interrupt the poll-interval sleep on cancellation', async () => {
    const scheduler = createScheduler({
      policy: { pollIntervalMs: 60 * 60 * 1000 },
      onCycle: () => {
        setTimeout(() => controller.abort(), 10);
      },
    });

    const exit = await scheduler.run(controller.signal);

    expect(exit).toEqual({ reason: 'cancelled', cycles: 1 });
    expect(scheduler.lastOutcome).toEqual({
      outcome: { ok: true, slotsFound: 0, admitted: 0 },
      nextDelayMs: 60 * 60 * 1000,
    });
  });

  it('should refuse to run twice', async () => {
    const { sleep } = stopAfter(controller, 1);
    const scheduler = createScheduler({ sleep });
    await scheduler.run(controller.signal);

    await expect(scheduler.run(new AbortController().signal)).rejects.toThrow('has already run');
  });
});
