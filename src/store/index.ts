import type { StateStorage } from 'zustand/middleware';
import type { Preferences } from '../lib/config';
import { createDisplayStore, type DisplayStore } from './displayStore';
import { createOperationStore, type OperationStore } from './operationStore';
import { createPreferencesStore, type PreferencesStore } from './preferencesStore';
import { createReferenceStore, type ReferenceStore } from './referenceStore';
import { createTimerStore, type TimerStore } from './timerStore';

/**
 * Все хранилища трекера. Каждое — отдельная критическая секция;
 * ни одна операция не трогает два хранилища внутри одного setState.
 */
export interface TrackerStores {
  reference: ReferenceStore;
  timer: TimerStore;
  operations: OperationStore;
  display: DisplayStore;
  preferences: PreferencesStore;
}

export function createTrackerStores(storage: StateStorage, initialPreferences?: Preferences): TrackerStores {
  return {
    reference: createReferenceStore(),
    timer: createTimerStore(),
    operations: createOperationStore(),
    display: createDisplayStore(),
    preferences: createPreferencesStore(storage, initialPreferences),
  };
}
