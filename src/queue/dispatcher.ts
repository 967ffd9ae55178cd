import { handleResult, type HandlerContext, type HandlerTable } from '../handlers';
import type { Cancel, RefreshSignal, Scheduler } from '../host/types';
import { logger } from '../lib/logger';
import type { FollowUp, FollowUpOutcome, QueueMessage } from './messages';
import type { ResultQueue } from './result-queue';
import type { SingleFlightGuard } from './single-flight';

export const MAX_MESSAGES_PER_TICK = 10;
export const DISPATCH_INTERVAL_MS = 100;

export interface FollowUpExecutor {
  run(followUp: FollowUp, message: QueueMessage): FollowUpOutcome;
}

export interface DispatcherDeps {
  queue: ResultQueue;
  handlers: HandlerTable;
  context: HandlerContext;
  followUps: FollowUpExecutor;
  guard: SingleFlightGuard;
  refresh: RefreshSignal;
  maxPerTick?: number;
}

/**
 * Единственный потребитель очереди результатов.
 * Работает на главном контексте: за тик обрабатывает не больше maxPerTick
 * сообщений в порядке FIFO, остальное — на следующем тике.
 */
export class ResultDispatcher {
  private readonly maxPerTick: number;
  private cancelTick: Cancel | null = null;

  constructor(private readonly deps: DispatcherDeps) {
    this.maxPerTick = deps.maxPerTick ?? MAX_MESSAGES_PER_TICK;
  }

  get isRunning(): boolean {
    return this.cancelTick !== null;
  }

  start(scheduler: Scheduler, intervalMs: number = DISPATCH_INTERVAL_MS): void {
    if (this.isRunning) {
      return;
    }
    this.cancelTick = scheduler.every(intervalMs, () => {
      this.tick();
    });
    logger.debug('DISPATCH', `Started, interval ${intervalMs}ms`);
  }

  stop(): void {
    if (!this.cancelTick) {
      return;
    }
    this.cancelTick();
    this.cancelTick = null;
    logger.debug('DISPATCH', 'Stopped');
  }

  /** Handles one batch; returns how many messages were processed. */
  tick(): number {
    const batch = this.deps.queue.drain(this.maxPerTick);
    batch.forEach((message) => this.process(message));
    if (!this.deps.queue.isEmpty()) {
      logger.debug('DISPATCH', `${this.deps.queue.size} messages left for the next tick`);
    }

    // Перерисовка после каждого пакета, даже пустого: таймер в UI тикает
    try {
      this.deps.refresh.requestRefresh();
    } catch (error) {
      logger.error('DISPATCH', 'Refresh request failed', error);
    }
    return batch.length;
  }

  private process(message: QueueMessage): void {
    let outcome: FollowUpOutcome = 'done';
    try {
      try {
        handleResult(this.deps.handlers, message.result, this.deps.context);
      } catch (error) {
        logger.error('DISPATCH', `Handler for "${message.result.kind}" failed`, error);
      }

      if (message.followUp) {
        try {
          outcome = this.deps.followUps.run(message.followUp, message);
        } catch (error) {
          logger.error('DISPATCH', `Follow-up "${message.followUp.type}" failed`, error);
        }
      }
    } finally {
      if (message.release && outcome !== 'handover') {
        this.deps.guard.end(message.release);
      }
    }
  }
}
