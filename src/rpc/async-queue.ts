/**
 * Bounded FIFO with async hand-off between producers and one or more consumers.
 * publish() waits while the queue is full, consume() waits while it is empty.
 * Both reject with QueueAbortedError when their signal fires.
 */

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (err: Error) => void;
}

export class QueueAbortedError extends Error {
  constructor() {
    super('Aborted');
    this.name = 'QueueAbortedError';
  }
}

export class AsyncQueue<T> {
  private items: T[] = [];
  private producers: Waiter<void>[] = [];
  private consumers: Waiter<T>[] = [];

  constructor(private readonly capacity = 100) {}

  async publish(item: T, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new QueueAbortedError();

    const consumer = this.consumers.shift();
    if (consumer) {
      consumer.resolve(item);
      return;
    }

    if (this.items.length >= this.capacity) {
      await this.wait(this.producers, signal);
    }
    this.items.push(item);
  }

  async consume(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) throw new QueueAbortedError();

    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      this.producers.shift()?.resolve();
      return item;
    }
    return this.wait(this.consumers, signal);
  }

  /** Remove and return everything still queued. */
  clear(): T[] {
    const drained = this.items;
    this.items = [];
    for (const producer of this.producers.splice(0)) producer.resolve();
    return drained;
  }

  get size(): number {
    return this.items.length;
  }

  get pending(): number {
    return this.consumers.length;
  }

  private wait<V>(waiters: Waiter<V>[], signal?: AbortSignal): Promise<V> {
    return new Promise<V>((resolve, reject) => {
      const onAbort = () => {
        const idx = waiters.indexOf(entry);
        if (idx !== -1) waiters.splice(idx, 1);
        reject(new QueueAbortedError());
      };
      const entry: Waiter<V> = {
        resolve: (value) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(value);
        },
        reject,
      };
      waiters.push(entry);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
