import { QueueOverflowError } from "./errors";

/**
 * Bounded FIFO with a single async consumer. `next()` resolves with the
 * oldest item, or with `undefined` once the queue is closed.
 */
export class EventQueue<T> {
  private items: T[] = [];
  private waiter: ((item: T | undefined) => void) | null = null;
  private closed = false;

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @throws QueueOverflowError when the queue already holds `capacity` items
   */
  push(item: T): void {
    if (this.closed) {
      return;
    }

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
      return;
    }

    if (this.items.length >= this.capacity) {
      throw new QueueOverflowError(this.capacity);
    }

    this.items.push(item);
  }

  next(): Promise<T | undefined> {
    if (this.closed) {
      return Promise.resolve(undefined);
    }

    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Drops pending items and releases a waiting consumer. */
  close(): void {
    this.closed = true;
    this.items = [];

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(undefined);
    }
  }
}
