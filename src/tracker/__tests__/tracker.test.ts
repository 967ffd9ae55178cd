/**
 * Unit тесты для жизненного цикла трекера
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { TimeEntry } from '../../lib/api';
import { clearSentryUser, setSentryContext } from '../../lib/sentry';
import { createFakeApi, createFakeHost, MemoryStorage, testPreferences, type FakeApi, type FakeHost } from '../../test/fakes';
import { SAVED_TASK_KEY } from '../persistence';
import { createTracker, INITIAL_TIMER_CHECK_DELAY_MS, LOAD_RESTORE_DELAY_MS, type Tracker } from '../tracker';

vi.mock('../../lib/sentry', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../lib/sentry')>()),
  setSentryContext: vi.fn(),
  setSentryUser: vi.fn(),
  clearSentryUser: vi.fn(),
}));

const START_MS = Date.UTC(2024, 4, 1, 10, 0, 0);

describe('createTracker', () => {
  let host: FakeHost;
  let api: FakeApi;
  let tracker: Tracker;

  beforeEach(() => {
    vi.mocked(setSentryContext).mockClear();
    vi.mocked(clearSentryUser).mockClear();
    host = createFakeHost();
    api = createFakeApi();
    tracker = createTracker({
      host,
      storage: new MemoryStorage(),
      api,
      now: () => START_MS,
      preferences: testPreferences,
    });
  });

  describe('register', () => {
    it('starts the dispatcher and loads reference data', () => {
      host.document.set(SAVED_TASK_KEY, 'Saved task');

      tracker.register();

      expect(tracker.isRegistered).toBe(true);
      expect(tracker.dispatcher.isRunning).toBe(true);
      expect(host.scheduler.repeatingCount).toBe(1);
      expect(api.getClients).toHaveBeenCalledTimes(1);
      expect(api.getProjects).toHaveBeenCalledTimes(1);
      expect(tracker.stores.display.getState().taskDescription).toBe('Saved task');
      expect(setSentryContext).toHaveBeenCalledWith('tracker', { workspaceId: 'ws1' });
    });

    it('applies fetched data on the next dispatcher tick', async () => {
      tracker.register();
      await tracker.launcher.whenIdle();

      host.scheduler.tick();

      expect(tracker.stores.display.getState().clientSelection).toBe('c1');
      expect(tracker.stores.display.getState().projectSelection).toBe('p1');
      expect(host.refresh.count).toBe(1);
    });

    it('checks the running timer after a delay', () => {
      tracker.register();
      expect(api.getInProgressEntries).not.toHaveBeenCalled();

      host.scheduler.advance(INITIAL_TIMER_CHECK_DELAY_MS);

      expect(api.getInProgressEntries).toHaveBeenCalledTimes(1);
      expect(host.scheduler.pendingCount).toBe(0);
    });

    it('is idempotent', () => {
      tracker.register();
      tracker.register();

      expect(host.scheduler.repeatingCount).toBe(1);
      expect(api.getClients).toHaveBeenCalledTimes(1);
    });
  });

  describe('unregister', () => {
    it('stops the dispatcher, clears flags and cancels pending work', () => {
      tracker.register();
      tracker.guard.tryBegin('start');

      tracker.unregister();

      expect(tracker.isRegistered).toBe(false);
      expect(tracker.dispatcher.isRunning).toBe(false);
      expect(host.scheduler.repeatingCount).toBe(0);
      expect(tracker.controller.isBusy('start')).toBe(false);
      expect(clearSentryUser).toHaveBeenCalledTimes(1);

      host.scheduler.advance(INITIAL_TIMER_CHECK_DELAY_MS);
      expect(api.getInProgressEntries).not.toHaveBeenCalled();
    });

    it('drops queued results so their release tags cannot clear new flags', async () => {
      tracker.register();
      tracker.controller.stopTimer();
      await tracker.launcher.whenIdle();
      expect(tracker.queue.isEmpty()).toBe(false);

      tracker.unregister();

      expect(tracker.queue.isEmpty()).toBe(true);
    });

    it('keeps a new stop exclusive while an old one finishes', async () => {
      const pending: Array<(entries: TimeEntry[]) => void> = [];
      api.getInProgressEntries.mockImplementation(
        () =>
          new Promise<TimeEntry[]>((resolve) => {
            pending.push(resolve);
          }),
      );
      tracker.register();
      expect(tracker.controller.stopTimer()).toEqual({ ok: true });
      tracker.unregister();
      tracker.register();
      expect(tracker.controller.stopTimer()).toEqual({ ok: true });
      expect(pending).toHaveLength(2);

      const [finishFirst, finishSecond] = pending;
      finishFirst([]);
      await new Promise((resolve) => setImmediate(resolve));
      host.scheduler.tick();

      expect(tracker.controller.stopTimer()).toEqual({
        ok: false,
        reason: 'Timer is already stopping, please wait...',
      });

      finishSecond([]);
      await tracker.launcher.whenIdle();
      host.scheduler.tick();

      expect(tracker.controller.isBusy('stop')).toBe(false);
    });

    it('does nothing when not registered', () => {
      tracker.unregister();
      expect(clearSentryUser).not.toHaveBeenCalled();
    });
  });

  describe('document hooks', () => {
    it('saves the task description before the document is written', () => {
      tracker.controller.setTaskDescription('Write report');

      tracker.onBeforeSave();

      expect(host.document.fields.get(SAVED_TASK_KEY)).toBe('Write report');
    });

    it('restores the task description shortly after a load', () => {
      host.document.set(SAVED_TASK_KEY, 'From document');

      tracker.onAfterLoad();
      expect(tracker.stores.display.getState().taskDescription).toBe('Untitled');

      host.scheduler.advance(LOAD_RESTORE_DELAY_MS);
      expect(tracker.stores.display.getState().taskDescription).toBe('From document');
    });
  });

  describe('rendering', () => {
    it('renders the running timer from the clock', () => {
      tracker.stores.timer.getState().setStartedAt(START_MS / 1000 - 3661);
      tracker.stores.display.getState().update({ activeTimerId: 'te1', activeProjectName: 'Website' });

      expect(tracker.snapshot().currentDuration).toBe(3661);
      expect(tracker.renderTopbar()).toBe('⏱ 01:01:01 $25.42 (Website)');
    });

    it('renders nothing in the top bar while idle', () => {
      expect(tracker.renderTopbar()).toBeNull();
      expect(tracker.renderPanel()).toEqual([]);
    });
  });

  it('applies preference overrides over the stored values', () => {
    const overridden = createTracker({
      host,
      storage: new MemoryStorage(),
      api,
      preferences: testPreferences,
      overrides: { hourlyRate: 40, workspaceId: 'ws2' },
    });

    expect(overridden.stores.preferences.getState().getPreferences()).toMatchObject({
      hourlyRate: 40,
      workspaceId: 'ws2',
      apiKey: 'test-key',
    });
  });
});
