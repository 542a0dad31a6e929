import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AppointmentExtractor } from '../../src/core/appointment-extractor.js';
import { AuthenticatedSession } from '../../src/core/authenticated-session.js';
import { MonitorRegistry, type MonitorTaskFactory } from '../../src/core/monitor-registry.js';
import { NotificationGate } from '../../src/core/notification-gate.js';
import { PollScheduler } from '../../src/core/poll-scheduler.js';
import type { FilterSpec } from '../../src/types/index.js';
import { FakeLauncher, site } from '../helpers/fake-browser.js';
import { RecordingStore } from '../helpers/recording-store.js';

const filter: FilterSpec = { centers: ['london'], timePreferences: [] };

const pause = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('MonitorRegistry', () => {
  let launcher: FakeLauncher;
  let store: RecordingStore;
  let registry: MonitorRegistry;

  beforeEach(() => {
    launcher = new FakeLauncher();
    store = new RecordingStore();
    const gate = new NotificationGate();
    const createTask: MonitorTaskFactory = (userId, taskFilter) =>
      new PollScheduler({
        userId,
        filter: taskFilter,
        credentials: { username: 'learner', password: 'test-secret' },
        resultsUrl: site.resultsUrl,
        session: new AuthenticatedSession({ launcher, site, boundedWaitMs: 50, userId }),
        extractor: new AppointmentExtractor(site),
        gate,
        notifier: { notify: async () => {} },
        store,
        policy: { pollIntervalMs: 5 },
      });
    registry = new MonitorRegistry(createTask, store);
  });

  describe('start', () => {
    it('should start a monitor and expose its handle', async () => {
      const result = registry.start('u1', filter);

      expect(result.success).toBe(true);
      expect(registry.isRunning('u1')).toBe(true);
      expect(registry.count()).toBe(1);
      expect(registry.list().map((handle) => handle.userId)).toEqual(['u1']);

      await registry.stopAll();
    });

    it('should refuse a second monitor for the same user', async () => {
      registry.start('u1', filter);

      expect(registry.start('u1', filter)).toEqual({ success: false, reason: 'already_running' });
      expect(registry.count()).toBe(1);

      await registry.stopAll();
    });

    it('should run monitors for different users side by side', async () => {
      registry.start('u1', filter);
      registry.start('u2', filter);

      expect(registry.count()).toBe(2);
      await registry.stopAll();
      expect(registry.count()).toBe(0);
    });

    it('should record the monitor start', async () => {
      registry.start('u1', filter);

      expect(store.starts).toEqual(['u1']);
      await registry.stopAll();
    });

    it('should start even when the start cannot be logged', async () => {
      store.failing.add('logMonitorStart');

      expect(registry.start('u1', filter).success).toBe(true);

      await registry.stop('u1');
      expect(store.stops).toEqual([]);
    });
  });

  describe('stop', () => {
    it('should report a user without a monitor', async () => {
      expect(await registry.stop('nobody')).toEqual({ success: false, reason: 'not_running' });
    });

    it('should cancel the monitor and release its session', async () => {
      registry.start('u1', filter);
      await pause(30);

      const result = await registry.stop('u1');

      expect(result.success && result.exit.reason).toBe('cancelled');
      expect(registry.isRunning('u1')).toBe(false);
      expect(launcher.openHandles).toBe(0);
      expect(store.stops).toEqual(['u1']);
    });

    it('should record no checks after stop resolves', async () => {
      registry.start('u1', filter);
      await pause(30);
      await registry.stop('u1');
      const checksAtStop = store.checks.length;

      await pause(30);

      expect(store.checks.length).toBe(checksAtStop);
    });

    it('should share one wait between concurrent stops', async () => {
      registry.start('u1', filter);

      const [first, second] = await Promise.all([registry.stop('u1'), registry.stop('u1')]);

      expect(first).toBe(second);
      expect(store.stops).toEqual(['u1']);
    });

    it('should allow a new monitor after stop', async () => {
      registry.start('u1', filter);
      await registry.stop('u1');

      expect(registry.start('u1', filter).success).toBe(true);
      await registry.stopAll();
    });
  });

  describe('fatal task exit', () => {
    it('should deregister a monitor whose browser cannot start', async () => {
      launcher.failWith = new Error('no chromium');
      const result = registry.start('u1', filter);
      if (!result.success) throw new Error('start failed');

      const exit = await result.handle.done;

      expect(exit).toEqual({ reason: 'failed', cycles: 0, error: 'Browser could not be started: no chromium' });
      expect(registry.isRunning('u1')).toBe(false);
      await vi.waitFor(() => expect(store.stops).toEqual(['u1']));
      expect(store.checks).toEqual([
        { userId: 'u1', appointmentsFound: 0, success: false, errorMessage: 'Browser could not be started: no chromium' },
      ]);
      expect(registry.lastFailure('u1')).toMatchObject({ error: 'Browser could not be started: no chromium', cycles: 0 });
    });

    it('should forget the failure on the next start', async () => {
      launcher.failWith = new Error('no chromium');
      const failed = registry.start('u1', filter);
      if (!failed.success) throw new Error('start failed');
      await failed.handle.done;
      await vi.waitFor(() => expect(store.stops).toEqual(['u1']));

      launcher.failWith = null;
      registry.start('u1', filter);

      expect(registry.lastFailure('u1')).toBeUndefined();
      await registry.stopAll();
    });

    it('should not record a failure for a monitor stopped on request', async () => {
      registry.start('u1', filter);

      await registry.stop('u1');

      expect(registry.lastFailure('u1')).toBeUndefined();
      expect(store.checks.filter((check) => !check.success)).toEqual([]);
    });
  });

  describe('handle', () => {
    it('should report task progress', async () => {
      const result = registry.start('u1', filter);
      if (!result.success) throw new Error('start failed');
      await vi.waitFor(() => expect(result.handle.cycles).toBeGreaterThan(0));

      expect(result.handle.lastOutcome).toEqual({ ok: true, slotsFound: 0, admitted: 0 });
      expect(result.handle.nextDelayMs).toBe(5);

      await registry.stopAll();
    });
  });
});
