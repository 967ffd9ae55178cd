import { createStore, type StoreApi } from 'zustand/vanilla';

/**
 * Сессия таймера. startedAt !== null ⇔ сессия идёт.
 * Пишется и обработчиками, и фоновой задачей остановки (lastSessionDuration).
 */
export interface TimerState {
  /** Seconds since epoch. */
  startedAt: number | null;
  /** Seconds. */
  lastSessionDuration: number;

  getStartedAt: () => number | null;
  setStartedAt: (startedAt: number | null) => void;
  getLastSessionDuration: () => number;
  setLastSessionDuration: (seconds: number) => void;
  /** Elapsed seconds of the running session, 0 when idle. */
  currentDuration: (nowSeconds: number) => number;
  reset: () => void;
}

export type TimerStore = StoreApi<TimerState>;

export function createTimerStore(): TimerStore {
  return createStore<TimerState>()((set, get) => ({
    startedAt: null,
    lastSessionDuration: 0,

    getStartedAt: () => get().startedAt,
    setStartedAt: (startedAt) => set({ startedAt }),
    getLastSessionDuration: () => get().lastSessionDuration,
    setLastSessionDuration: (seconds) => set({ lastSessionDuration: Math.max(0, seconds) }),

    currentDuration: (nowSeconds) => {
      const { startedAt } = get();
      if (startedAt === null) {
        return 0;
      }
      return Math.max(0, nowSeconds - startedAt);
    },

    reset: () => set({ startedAt: null, lastSessionDuration: 0 }),
  }));
}
