/**
 * Unbounded FIFO with one consumer. Producers never wait; the consumer awaits `recv()`.
 * There is no capacity limit, so a runaway producer grows memory. `length` is exported
 * through the status endpoint so that growth is visible.
 */
export class Mailbox<T> {
  private queue: T[] = [];
  private waiter: ((item: T | undefined) => void) | undefined;
  private closed = false;

  get length(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false once the mailbox is closed; the item is not enqueued. */
  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(item);
    } else {
      this.queue.push(item);
    }
    return true;
  }

  /**
   * Resolves with the next item, or undefined once closed and drained.
   * Only one recv may be outstanding at a time.
   */
  recv(): Promise<T | undefined> {
    if (this.queue.length > 0) return Promise.resolve(this.queue.shift());
    if (this.closed) return Promise.resolve(undefined);
    if (this.waiter) return Promise.reject(new Error('mailbox already has a pending receiver'));

    return new Promise(resolve => {
      this.waiter = resolve;
    });
  }

  /** Stops accepting items. Items already queued are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.(undefined);
  }

  /** Removes everything still queued. */
  drain(): T[] {
    const items = this.queue;
    this.queue = [];
    return items;
  }
}
