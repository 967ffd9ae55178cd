import type { ConfirmationGate } from '../host/types';
import type { MessageKind, QueuePayloads } from '../queue/messages';
import type { TrackerStores } from '../store';

export interface HandlerContext {
  stores: TrackerStores;
  confirmation: ConfirmationGate;
  /** Seconds since epoch. */
  nowSeconds: () => number;
}

export type ResultHandler<K extends MessageKind> = (payload: QueuePayloads[K], ctx: HandlerContext) => void;

export type HandlerTable = { [K in MessageKind]: ResultHandler<K> };
