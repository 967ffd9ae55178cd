import type { DocumentFields } from '../host/types';
import { logger } from '../lib/logger';
import type { DisplayStore } from '../store/displayStore';

export const SAVED_TASK_KEY = 'tracker_saved_task';

/** Описание задачи живёт вместе с документом хоста. */
export function saveTaskDescription(document: DocumentFields, display: DisplayStore): void {
  const description = display.getState().taskDescription;
  document.set(SAVED_TASK_KEY, description);
  logger.debug('PERSIST', `Saved task description: ${description}`);
}

export function loadTaskDescription(document: DocumentFields, display: DisplayStore): string | null {
  const saved = document.get(SAVED_TASK_KEY);
  if (saved === undefined) {
    return null;
  }
  display.getState().update({ taskDescription: saved });
  logger.debug('PERSIST', `Loaded task description: ${saved}`);
  return saved;
}
