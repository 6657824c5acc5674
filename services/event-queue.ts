import EventEmitter from "eventemitter3";

import { generateId } from "@/utils/random";

export type Task<T> = () => T | Promise<T>;

type QueueItem = {
  id: string;
  label: string;
  timestamp: number;
  run: () => Promise<void>;
};

/**
 * Single-consumer work queue. Transport callbacks, user input and AI
 * callbacks all enqueue here, so each unit of work sees the chat state
 * exactly as the previous one left it.
 *
 * A unit of work that throws is logged and reported as `failed`; the queue
 * keeps going with the next item. There is no retry.
 */
export class EventQueue extends EventEmitter {
  private queue: QueueItem[] = [];
  private processing = false;
  private idleWaiters: (() => void)[] = [];

  /**
   * Add a unit of work. The returned promise settles with the task's result,
   * or resolves to undefined when the task threw.
   */
  enqueue<T>(label: string, task: Task<T>): Promise<T | undefined> {
    return new Promise((resolve) => {
      const item: QueueItem = {
        id: generateId(),
        label,
        timestamp: Date.now(),
        run: async () => {
          try {
            this.emit("processing", item);
            const result = await task();
            this.emit("processed", item);
            resolve(result);
          } catch (error) {
            console.error(`[EventQueue] Failed to process ${label}:`, error);
            this.emit("failed", item, error);
            resolve(undefined);
          }
        },
      };

      this.queue.push(item);
      this.emit("enqueued", item);

      if (!this.processing) {
        void this.startProcessing();
      }
    });
  }

  /** Resolves once every queued item, including ones added meanwhile, has run. */
  onIdle(): Promise<void> {
    if (!this.processing && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  getQueueSize(): number {
    return this.queue.length;
  }

  private async startProcessing() {
    this.processing = true;

    while (this.queue.length > 0) {
      const item = this.queue.shift();
      if (item) {
        await item.run();
      }
    }

    this.processing = false;

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
