/**
 * Async Queue
 * Unbounded FIFO with a single-consumer timed get and an explicit close.
 *
 * Closing wakes every waiting getter with { status: 'closed' } so no
 * consumer is left blocked on a queue nobody will feed again.
 */

export class QueueClosedError extends Error {
  constructor(message = 'Queue is closed') {
    super(message);
    this.name = 'QueueClosedError';
  }
}

export type QueueGetResult<T> =
  | { status: 'item'; item: T }
  | { status: 'timeout' }
  | { status: 'closed' };

interface Waiter<T> {
  resolve: (result: QueueGetResult<T>) => void;
}

export class AsyncQueue<T> {
  private items: T[] = [];
  private head = 0;
  private waiters: Waiter<T>[] = [];
  private isClosed = false;

  get size(): number {
    return this.items.length - this.head;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Append an item. Hands it straight to a waiting getter if there is one.
   */
  put(item: T): void {
    if (this.isClosed) {
      throw new QueueClosedError();
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ status: 'item', item });
      return;
    }
    this.items.push(item);
  }

  tryGet(): T | undefined {
    if (this.size === 0) return undefined;
    const item = this.items[this.head];
    this.head++;
    this.compact();
    return item;
  }

  /**
   * Wait up to timeoutMs for the next item.
   * Buffered items are returned even after close; an aborted signal reads as timeout.
   */
  get(timeoutMs: number, signal?: AbortSignal): Promise<QueueGetResult<T>> {
    if (this.size > 0) {
      const item = this.items[this.head];
      this.head++;
      this.compact();
      return Promise.resolve<QueueGetResult<T>>({ status: 'item', item });
    }
    if (this.isClosed) {
      return Promise.resolve<QueueGetResult<T>>({ status: 'closed' });
    }
    if (signal?.aborted) {
      return Promise.resolve<QueueGetResult<T>>({ status: 'timeout' });
    }

    return new Promise<QueueGetResult<T>>(resolve => {
      const waiter: Waiter<T> = {
        resolve: result => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
          resolve(result);
        },
      };
      const onAbort = (): void => this.expire(waiter);
      const timer = setTimeout(() => this.expire(waiter), timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Remove and return everything buffered
   */
  drain(): T[] {
    const drained = this.items.slice(this.head);
    this.items = [];
    this.head = 0;
    return drained;
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.resolve({ status: 'closed' });
    }
  }

  private expire(waiter: Waiter<T>): void {
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) {
      this.waiters.splice(index, 1);
      waiter.resolve({ status: 'timeout' });
    }
  }

  private compact(): void {
    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
    } else if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }
}
