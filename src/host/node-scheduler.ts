import type { Cancel, Scheduler } from './types';

/** Scheduler on Node timers; callbacks run on the event loop, one at a time. */
export class NodeScheduler implements Scheduler {
  every(intervalMs: number, callback: () => void): Cancel {
    const handle = setInterval(callback, intervalMs);
    return () => clearInterval(handle);
  }

  after(delayMs: number, callback: () => void): Cancel {
    const handle = setTimeout(callback, delayMs);
    return () => clearTimeout(handle);
  }
}
