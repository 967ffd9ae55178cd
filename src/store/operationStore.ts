import { createStore, type StoreApi } from 'zustand/vanilla';
import type { OperationKind } from '../queue/messages';

export type OperationFlags = Record<OperationKind, boolean>;

export interface OperationState {
  flags: OperationFlags;
  isInProgress: (kind: OperationKind) => boolean;
  /** Sets the flag only when it is clear; returns whether it was set. */
  claim: (kind: OperationKind) => boolean;
  release: (kind: OperationKind) => void;
  releaseAll: () => void;
}

export type OperationStore = StoreApi<OperationState>;

const idleFlags = (): OperationFlags => ({ start: false, stop: false, status: false });

export function createOperationStore(): OperationStore {
  return createStore<OperationState>()((set, get) => ({
    flags: idleFlags(),

    isInProgress: (kind) => get().flags[kind],

    // Проверка и установка в одном синхронном шаге — между ними никто не вклинится
    claim: (kind) => {
      if (get().flags[kind]) {
        return false;
      }
      set({ flags: { ...get().flags, [kind]: true } });
      return true;
    },

    release: (kind) => set({ flags: { ...get().flags, [kind]: false } }),

    releaseAll: () => set({ flags: idleFlags() }),
  }));
}
