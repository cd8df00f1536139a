// Unbounded FIFO channel between the submitting callers and the single worker.
// Producers never wait; the one consumer parks on a promise until an item
// arrives or its idle timeout fires.

import { IllegalStateError } from "./errors.ts";

/** Returned by dequeue() when the idle timeout elapsed with nothing queued */
export const EMPTY: unique symbol = Symbol("dispatch-queue.empty");
export type Empty = typeof EMPTY;

interface ParkedConsumer<T> {
  resolve: (item: T | Empty) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class DispatchQueue<T> {
  private items: T[] = [];
  private consumer: ParkedConsumer<T> | null = null;

  /**
   * Append an item. Hands it straight to the parked consumer if there is one.
   */
  enqueue(item: T): void {
    const consumer = this.consumer;
    if (consumer) {
      this.consumer = null;
      clearTimeout(consumer.timer);
      consumer.resolve(item);
      return;
    }
    this.items.push(item);
  }

  /**
   * Take the next item, waiting at most `timeoutMs` for one to arrive.
   * Only one dequeue may be outstanding at a time.
   */
  dequeue(timeoutMs: number): Promise<T | Empty> {
    if (this.consumer) {
      throw new IllegalStateError("DispatchQueue supports a single consumer");
    }
    if (this.items.length > 0) {
      const [next] = this.items.splice(0, 1);
      return Promise.resolve(next);
    }

    return new Promise<T | Empty>((resolve) => {
      const timer = setTimeout(() => {
        this.consumer = null;
        resolve(EMPTY);
      }, timeoutMs);
      // An idle worker must not keep the process alive on its own
      timer.unref();
      this.consumer = { resolve, timer };
    });
  }

  get size(): number {
    return this.items.length;
  }

  get hasWaitingConsumer(): boolean {
    return this.consumer !== null;
  }
}
