/** Fixed-capacity FIFO. Full buffers either reject writes or evict the oldest entry. */
export class RingBuffer<T> {
  private readonly buf: Array<T | undefined>;
  private head = 0;
  private tail = 0;
  private sizeValue = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`RingBuffer capacity must be a positive integer (got ${capacity})`);
    }

    this.buf = new Array<T | undefined>(capacity);
  }

  get capacity(): number {
    return this.buf.length;
  }

  get size(): number {
    return this.sizeValue;
  }

  get isEmpty(): boolean {
    return this.sizeValue === 0;
  }

  get isFull(): boolean {
    return this.sizeValue === this.buf.length;
  }

  clear(): void {
    // Avoid holding references.
    for (let i = 0; i < this.sizeValue; i++) {
      this.buf[(this.head + i) % this.buf.length] = undefined;
    }
    this.head = 0;
    this.tail = 0;
    this.sizeValue = 0;
  }

  peek(): T | undefined {
    if (this.sizeValue === 0) return undefined;
    return this.buf[this.head];
  }

  /** Returns false (and stores nothing) when the buffer is full. */
  push(v: T): boolean {
    if (this.sizeValue === this.buf.length) return false;
    this.buf[this.tail] = v;
    this.tail = (this.tail + 1) % this.buf.length;
    this.sizeValue++;
    return true;
  }

  /**
   * Always stores `v`. When the buffer is full the oldest entry is evicted
   * and returned as `{ evicted }`; otherwise returns null.
   */
  pushEvicting(v: T): { evicted: T } | null {
    let out: { evicted: T } | null = null;
    if (this.sizeValue === this.buf.length) {
      const oldest = this.shift();
      if (oldest !== undefined) out = { evicted: oldest };
    }
    this.push(v);
    return out;
  }

  shift(): T | undefined {
    if (this.sizeValue === 0) return undefined;
    const v = this.buf[this.head];
    this.buf[this.head] = undefined;
    this.head = (this.head + 1) % this.buf.length;
    this.sizeValue--;
    return v;
  }

  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.sizeValue; i++) {
      const v = this.buf[(this.head + i) % this.buf.length];
      if (v !== undefined) out.push(v);
    }
    return out;
  }
}
