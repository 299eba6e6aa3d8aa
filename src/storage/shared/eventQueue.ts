import { RingBuffer } from "./ringBuffer";

export type BoundedEventQueueOptions<T> = {
  /** Called after an entry was evicted to make room; `dropped` is the running total. */
  onOverflow?: (evicted: T, dropped: number) => void;
  /** Called once when the consumer stops iterating early (`break`, `return` or a throw in the loop). */
  onReturn?: () => void;
};

type Waiter<T> = {
  resolve: (r: IteratorResult<T, undefined>) => void;
  reject: (err: Error) => void;
};

/**
 * Single-consumer async queue with a fixed capacity.
 *
 * Writes never wait: a full queue evicts its oldest entry. Readers pull with
 * `for await`, `next()` or `tryShift()`. Closing with an error makes the reader
 * throw once the remaining entries are drained.
 */
export class BoundedEventQueue<T> implements AsyncIterable<T> {
  private readonly buffer: RingBuffer<T>;
  private readonly waiters: Waiter<T>[] = [];
  private readonly onOverflow: ((evicted: T, dropped: number) => void) | null;
  private readonly onReturn: (() => void) | null;

  private droppedValue = 0;
  private closedValue = false;
  private failure: Error | null = null;

  constructor(capacity: number, options?: BoundedEventQueueOptions<T>) {
    this.buffer = new RingBuffer<T>(capacity);
    this.onOverflow = options?.onOverflow ?? null;
    this.onReturn = options?.onReturn ?? null;
  }

  get capacity(): number {
    return this.buffer.capacity;
  }

  get size(): number {
    return this.buffer.size;
  }

  /** Number of entries evicted because the consumer fell behind. */
  get dropped(): number {
    return this.droppedValue;
  }

  get closed(): boolean {
    return this.closedValue;
  }

  /** Returns false once the queue is closed. */
  push(v: T): boolean {
    if (this.closedValue) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: v, done: false });
      return true;
    }

    const overflow = this.buffer.pushEvicting(v);
    if (overflow) {
      this.droppedValue++;
      this.onOverflow?.(overflow.evicted, this.droppedValue);
    }
    return true;
  }

  tryShift(): T | undefined {
    return this.buffer.shift();
  }

  toArray(): T[] {
    return this.buffer.toArray();
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const v = this.buffer.shift();
    if (v !== undefined) return Promise.resolve({ value: v, done: false });
    if (this.failure) return Promise.reject(this.failure);
    if (this.closedValue) return Promise.resolve({ value: undefined, done: true });

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(error?: Error): void {
    if (this.closedValue) return;
    this.closedValue = true;
    this.failure = error ?? null;

    for (const waiter of this.waiters.splice(0)) {
      if (error) waiter.reject(error);
      else waiter.resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        const wasOpen = !this.closedValue;
        this.close();
        if (wasOpen) this.onReturn?.();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
