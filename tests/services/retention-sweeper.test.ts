import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { NotificationGate } from '../../src/core/notification-gate.js';
import { RetentionSweeper } from '../../src/services/retention-sweeper.js';
import { RecordingStore } from '../helpers/recording-store.js';

const DAY = 24 * 60 * 60 * 1000;

describe('RetentionSweeper', () => {
  let now: number;
  let store: RecordingStore;
  let gate: NotificationGate;
  let sweeper: RetentionSweeper;

  beforeEach(() => {
    now = Date.parse('2025-06-01T12:00:00Z');
    store = new RecordingStore();
    gate = new NotificationGate({ cooldownMs: 0, retentionMs: 30 * DAY }, () => now);
    sweeper = new RetentionSweeper({ store, gate, retentionDays: 30, intervalMs: 1000 });
  });

  afterEach(() => {
    sweeper.stop();
    vi.useRealTimers();
  });

  it('should evict expired gate records and clean the store', async () => {
    const cleanup = vi.spyOn(store, 'cleanupOlderThan').mockResolvedValue({ checksRemoved: 4, appointmentsRemoved: 2 });
    gate.admit('u1', [{ center: 'london', date: '2025-05-30', time: '09:00', testType: 'car' }]);

    expect(await sweeper.sweep()).toEqual({ checksRemoved: 4, appointmentsRemoved: 2, gateRecordsEvicted: 1 });
    expect(cleanup).toHaveBeenCalledWith(30);
  });

  it('should resolve to null when the store cleanup fails', async () => {
    store.failing.add('cleanupOlderThan');

    expect(await sweeper.sweep()).toBeNull();
  });

  it('should share a sweep already in progress', async () => {
    const cleanup = vi.spyOn(store, 'cleanupOlderThan');

    const [first, second] = await Promise.all([sweeper.sweep(), sweeper.sweep()]);

    expect(first).toBe(second);
    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it('should sweep on its interval until stopped', async () => {
    vi.useFakeTimers();
    const cleanup = vi.spyOn(store, 'cleanupOlderThan');

    sweeper.start();
    expect(sweeper.isRunning).toBe(true);
    await vi.advanceTimersByTimeAsync(2500);
    expect(cleanup).toHaveBeenCalledTimes(2);

    sweeper.stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(cleanup).toHaveBeenCalledTimes(2);
    expect(sweeper.isRunning).toBe(false);
  });
});
