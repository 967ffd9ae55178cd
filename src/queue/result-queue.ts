import type { QueueMessage } from './messages';

/**
 * FIFO очередь результатов: много производителей (фоновые задачи),
 * один потребитель (ResultDispatcher).
 */
export class ResultQueue {
  private items: QueueMessage[] = [];

  enqueue(message: QueueMessage): void {
    this.items.push(message);
  }

  /** Removes and returns up to `max` messages in enqueue order. */
  drain(max: number): QueueMessage[] {
    if (max <= 0) {
      return [];
    }
    return this.items.splice(0, max);
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  clear(): void {
    this.items = [];
  }
}
