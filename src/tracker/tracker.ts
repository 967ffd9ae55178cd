import type { StateStorage } from 'zustand/middleware';
import { resultHandlers, type HandlerContext } from '../handlers';
import type { Cancel, TrackerHost } from '../host/types';
import { ApiClient, type TimeTrackingApi } from '../lib/api';
import type { Preferences } from '../lib/config';
import { logger } from '../lib/logger';
import { clearSentryUser, setSentryContext } from '../lib/sentry';
import { ResultDispatcher } from '../queue/dispatcher';
import { ResultQueue } from '../queue/result-queue';
import { SingleFlightGuard } from '../queue/single-flight';
import { TaskLauncher, type Clock } from '../queue/task-launcher';
import { createTrackerStores, type TrackerStores } from '../store';
import { TrackerController } from './controller';
import { renderPanel, renderTopbar, type DisplaySnapshot } from './display';
import { TrackerFollowUps } from './follow-ups';
import { loadTaskDescription, saveTaskDescription } from './persistence';

export const INITIAL_TIMER_CHECK_DELAY_MS = 2000;
export const LOAD_RESTORE_DELAY_MS = 500;

export interface TrackerOptions {
  host: TrackerHost;
  /** Where preferences are persisted. */
  storage: StateStorage;
  /** Defaults to the HTTP client configured from the stored preferences. */
  api?: TimeTrackingApi;
  /** Milliseconds since epoch. */
  now?: Clock;
  preferences?: Preferences;
  /** Applied over the stored preferences, e.g. from the environment. */
  overrides?: Partial<Preferences>;
}

export interface Tracker {
  stores: TrackerStores;
  controller: TrackerController;
  dispatcher: ResultDispatcher;
  launcher: TaskLauncher;
  guard: SingleFlightGuard;
  queue: ResultQueue;

  readonly isRegistered: boolean;
  register(): void;
  unregister(): void;
  /** Host hook: the document is about to be written. */
  onBeforeSave(): void;
  /** Host hook: a document has just been opened. */
  onAfterLoad(): void;

  snapshot(): DisplaySnapshot;
  renderTopbar(): string | null;
  renderPanel(): ReturnType<typeof renderPanel>;
}

/**
 * Собирает трекер: хранилища, очередь, фоновые задачи, диспетчер и контроллер.
 * Ничего не запускает до register().
 */
export function createTracker(options: TrackerOptions): Tracker {
  const { host, storage } = options;
  const now = options.now ?? Date.now;
  const nowSeconds = () => now() / 1000;

  const stores = createTrackerStores(storage, options.preferences);
  if (options.overrides && Object.keys(options.overrides).length > 0) {
    stores.preferences.getState().updatePreferences(options.overrides);
  }
  const api =
    options.api ??
    new ApiClient({
      baseURL: stores.preferences.getState().getPreferences().apiBaseUrl,
      timeoutMs: stores.preferences.getState().getPreferences().requestTimeoutMs,
      credentials: () => {
        const prefs = stores.preferences.getState().getPreferences();
        return { apiKey: prefs.apiKey, workspaceId: prefs.workspaceId, userId: prefs.userId };
      },
    });

  const queue = new ResultQueue();
  const guard = new SingleFlightGuard(stores.operations);
  const launcher = new TaskLauncher(api, queue, stores.timer, now);
  const context: HandlerContext = { stores, confirmation: host.confirmation, nowSeconds };
  const dispatcher = new ResultDispatcher({
    queue,
    handlers: resultHandlers,
    context,
    followUps: new TrackerFollowUps(stores, launcher),
    guard,
    refresh: host.refresh,
  });
  const controller = new TrackerController(stores, launcher, guard);

  const pending = new Set<Cancel>();
  let registered = false;

  const schedule = (delayMs: number, callback: () => void) => {
    const cancel = host.scheduler.after(delayMs, () => {
      pending.delete(cancel);
      callback();
    });
    pending.add(cancel);
  };

  const snapshot = (): DisplaySnapshot => ({
    fields: stores.display.getState(),
    preferences: stores.preferences.getState().getPreferences(),
    currentDuration: stores.timer.getState().currentDuration(nowSeconds()),
  });

  return {
    stores,
    controller,
    dispatcher,
    launcher,
    guard,
    queue,

    get isRegistered() {
      return registered;
    },

    register() {
      if (registered) {
        return;
      }
      registered = true;
      setSentryContext('tracker', { workspaceId: stores.preferences.getState().getPreferences().workspaceId });
      dispatcher.start(host.scheduler);

      void launcher.fetchClients();
      void launcher.fetchProjects();
      loadTaskDescription(host.document, stores.display);

      schedule(INITIAL_TIMER_CHECK_DELAY_MS, () => {
        void launcher.getCurrentTimer();
      });
      logger.info('LIFECYCLE', 'Tracker registered');
    },

    unregister() {
      if (!registered) {
        return;
      }
      registered = false;
      guard.reset();
      launcher.abandonInFlight();
      queue.clear();
      dispatcher.stop();
      pending.forEach((cancel) => cancel());
      pending.clear();
      clearSentryUser();
      logger.info('LIFECYCLE', 'Tracker unregistered');
    },

    onBeforeSave() {
      saveTaskDescription(host.document, stores.display);
    },

    onAfterLoad() {
      // Хост заполняет поля документа не сразу
      schedule(LOAD_RESTORE_DELAY_MS, () => {
        loadTaskDescription(host.document, stores.display);
      });
    },

    snapshot,
    renderTopbar: () => renderTopbar(snapshot()),
    renderPanel: () => renderPanel(snapshot()),
  };
}
