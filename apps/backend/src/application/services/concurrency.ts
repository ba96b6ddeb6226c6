// =============================================================================
// Concurrency Primitives
// =============================================================================

import { logger } from '../../infrastructure/logging/logger.js';

export type Release = () => void;

/**
 * Counting semaphore with FIFO admission.
 *
 * `acquire()` resolves to a release function; calling it more than once has
 * no further effect.
 */
export class Semaphore {
  private permits: number;
  private active = 0;
  private queue: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.permits = permits;
  }

  /** Permits currently held */
  get inUse(): number {
    return this.active;
  }

  /** Callers waiting for a permit */
  get waiting(): number {
    return this.queue.length;
  }

  async acquire(): Promise<Release> {
    if (this.permits > 0) {
      this.permits--;
      this.active++;
      return this.releaser();
    }

    return new Promise((resolve) => {
      this.queue.push(() => {
        this.permits--;
        this.active++;
        resolve(this.releaser());
      });
    });
  }

  /**
   * Run `fn` while holding a permit
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    this.permits++;
    this.active--;
    const next = this.queue.shift();
    if (next) {
      next();
    }
  }
}

/**
 * Interleave several async iterables into one.
 *
 * Items from the same source keep their relative order. Every source is
 * drained to completion; the merged stream ends when all of them have.
 * A source that throws fails the merged stream and closes the others.
 */
export async function* mergeAsyncIterables<T>(
  sources: AsyncIterable<T>[]
): AsyncGenerator<T, void, undefined> {
  const iterators = sources.map((source) => source[Symbol.asyncIterator]());
  const pending = new Map<number, Promise<{ index: number; result: IteratorResult<T> }>>();

  const pull = (index: number) => {
    pending.set(
      index,
      iterators[index].next().then((result) => ({ index, result }))
    );
  };

  iterators.forEach((_, index) => pull(index));

  try {
    while (pending.size > 0) {
      const { index, result } = await Promise.race(pending.values());
      if (result.done) {
        pending.delete(index);
        continue;
      }
      pull(index);
      yield result.value;
    }
  } finally {
    for (const index of pending.keys()) {
      const iterator = iterators[index];
      pending.delete(index);
      iterator.return?.().then(undefined, (error: unknown) => {
        logger.warn('Failed to close merged stream source', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }
  }
}

/**
 * Unbounded push-based queue consumed as an async iterable.
 *
 * Buffered items are delivered before a failure or the end of the queue.
 * Intended for a single consumer.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: Array<{
    resolve: (result: IteratorResult<T, undefined>) => void;
    reject: (error: unknown) => void;
  }> = [];
  private closed = false;
  private failure: { error: unknown } | null = null;

  push(item: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.items.push(item);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  fail(error: unknown): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = { error };
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
