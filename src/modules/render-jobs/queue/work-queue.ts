/**
 * In-process FIFO hand-off. Every pushed item is delivered to exactly one
 * `take()` caller; waiting takers are served in the order they arrived.
 */
export class WorkQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T | null) => void> = [];
  private closed = false;

  push(item: T) {
    if (this.closed) {
      throw new Error('Work queue is closed');
    }
    const waiter = this.waiters.shift();
    if (waiter) waiter(item);
    else this.items.push(item);
  }

  /** Resolves with the next item, or `null` once the queue is closed. */
  take(): Promise<T | null> {
    if (this.items.length > 0) {
      const [next] = this.items.splice(0, 1);
      return Promise.resolve(next);
    }
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  // Items still buffered are dropped; waiting takers receive `null`.
  close() {
    this.closed = true;
    this.items.length = 0;
    for (const waiter of this.waiters.splice(0)) waiter(null);
  }

  reopen() {
    this.closed = false;
  }

  get size() {
    return this.items.length;
  }

  get waiting() {
    return this.waiters.length;
  }
}
