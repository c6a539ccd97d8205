/**
 * FIFO with a hard capacity and a single async consumer.
 *
 * `offer` never blocks: it returns false when the queue is full or closed,
 * and the caller decides what a rejected item means. `take` resolves with
 * the next item, or with `undefined` once the queue is closed and drained.
 */
export class BoundedQueue<T> {
  private items: T[] = [];
  private head = 0;
  private closed = false;
  private waiter: ((item: T | undefined) => void) | null = null;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length - this.head;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  offer(item: T): boolean {
    if (this.closed) return false;

    if (this.waiter !== null) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
      return true;
    }

    if (this.size >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  take(): Promise<T | undefined> {
    if (this.size > 0) {
      return Promise.resolve(this.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    if (this.waiter !== null) {
      return Promise.reject(new Error('BoundedQueue supports a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Rejects further offers. Items already queued can still be taken. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.waiter !== null) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(undefined);
    }
  }

  /** Discards queued items and returns how many were discarded. */
  clear(): number {
    const discarded = this.size;
    this.items = [];
    this.head = 0;
    return discarded;
  }

  private shift(): T | undefined {
    const item = this.items[this.head];
    this.head++;

    // Compact once the consumed prefix dominates the backing array.
    if (this.head >= 1024 && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }
}
