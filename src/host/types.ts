/**
 * Интерфейсы хоста (GUI/рантайм), от которых зависит ядро.
 */

export type Cancel = () => void;

export interface Scheduler {
  /** Repeating tick; runs until the returned cancel is called. */
  every(intervalMs: number, callback: () => void): Cancel;
  /** One-shot delayed callback. */
  after(delayMs: number, callback: () => void): Cancel;
}

export interface RefreshSignal {
  /** Cheap and idempotent; the host redraws whatever shows tracker state. */
  requestRefresh(): void;
}

export interface ConfirmationGate {
  /**
   * Ask the user whether to reset the local timer. The answer comes back through
   * TrackerController.acknowledgeReset.
   */
  requestTimerReset(message: string): void;
}

/** Custom string properties persisted with the host document. */
export interface DocumentFields {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
}

export interface TrackerHost {
  scheduler: Scheduler;
  refresh: RefreshSignal;
  confirmation: ConfirmationGate;
  document: DocumentFields;
}
