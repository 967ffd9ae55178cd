import { DuplicateOperationError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { OperationStore } from '../store/operationStore';
import type { OperationKind } from './messages';

/**
 * Не больше одной операции каждого вида (start/stop/status) одновременно.
 * Флаг снимается всегда — через end() в finally или через release у сообщения.
 */
export class SingleFlightGuard {
  constructor(private readonly store: OperationStore) {}

  /** @throws DuplicateOperationError when an operation of this kind is already in flight */
  tryBegin(kind: OperationKind): void {
    if (!this.store.getState().claim(kind)) {
      logger.warn('SINGLE_FLIGHT', `Rejected duplicate "${kind}" operation`);
      throw new DuplicateOperationError(kind);
    }
  }

  end(kind: OperationKind): void {
    this.store.getState().release(kind);
  }

  isInProgress(kind: OperationKind): boolean {
    return this.store.getState().isInProgress(kind);
  }

  reset(): void {
    this.store.getState().releaseAll();
  }
}
