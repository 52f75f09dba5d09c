/**
 * Async FIFO between a socket's event callbacks and a reader that pulls one
 * message at a time. Readers suspend until something arrives; there is no
 * polling on the receive side.
 *
 * `end(final)` marks the source as finished: pending and future reads get
 * `final` once everything queued before it has been read.
 *
 * No Node imports — the browser channel uses it too.
 */

export class Inbox<T> {
  private readonly items: T[] = [];
  private waiters: Array<(item: T) => void> = [];
  private final: { item: T } | null = null;

  /** Messages queued and not yet read. */
  get size(): number {
    return this.items.length;
  }

  get ended(): boolean {
    return this.final !== null;
  }

  push(item: T): void {
    if (this.final) return; // late event after close
    const waiter = this.waiters.shift();
    if (waiter) waiter(item);
    else this.items.push(item);
  }

  end(item: T): void {
    if (this.final) return;
    this.final = { item };
    // Waiters only exist while the queue is empty
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter(item);
  }

  next(): Promise<T> {
    const queued = this.items.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.final) return Promise.resolve(this.final.item);
    return new Promise((resolve) => this.waiters.push(resolve));
  }
}
