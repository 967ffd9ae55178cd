import type { MessageKind, QueuePayloads, TaskResult } from '../queue/messages';
import {
  handleClientCreated,
  handleClientsFetched,
  handleProjectCreated,
  handleProjectsFetched,
} from './reference-handlers';
import { handleError, handleProjectSummary, handleUserInfo } from './status-handlers';
import {
  handleCurrentTimerFetched,
  handleNoActiveTimer,
  handleTimerStarted,
  handleTimerStopped,
} from './timer-handlers';
import type { HandlerContext, HandlerTable } from './types';

export type { HandlerContext, HandlerTable, ResultHandler } from './types';

export const resultHandlers: HandlerTable = {
  clientsFetched: handleClientsFetched,
  projectsFetched: handleProjectsFetched,
  clientCreated: handleClientCreated,
  projectCreated: handleProjectCreated,
  timerStarted: handleTimerStarted,
  timerStopped: handleTimerStopped,
  noActiveTimer: handleNoActiveTimer,
  currentTimerFetched: handleCurrentTimerFetched,
  projectSummary: handleProjectSummary,
  userInfo: handleUserInfo,
  error: handleError,
};

function invokeHandler<K extends MessageKind>(
  handlers: HandlerTable,
  kind: K,
  payload: QueuePayloads[K],
  ctx: HandlerContext,
): void {
  handlers[kind](payload, ctx);
}

export function handleResult(handlers: HandlerTable, result: TaskResult, ctx: HandlerContext): void {
  invokeHandler(handlers, result.kind, result.payload, ctx);
}
