/**
 * Fixed-capacity FIFO that evicts its oldest entry when full.
 * Backs the event hub's subscriber buffers and commentary log, and the orchestrator's
 * recent-action history.
 */
export class BoundedQueue<T> {
  readonly capacity: number;
  private items: (T | undefined)[];
  private head = 0;
  private _size = 0;
  private _dropped = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this._size;
  }

  /** Entries evicted to make room since construction */
  get dropped(): number {
    return this._dropped;
  }

  /** Returns the evicted entry, if any. */
  push(item: T): T | undefined {
    let evicted: T | undefined;
    if (this._size === this.capacity) {
      evicted = this.shift();
      this._dropped++;
    }
    this.items[(this.head + this._size) % this.capacity] = item;
    this._size++;
    return evicted;
  }

  shift(): T | undefined {
    if (this._size === 0) return undefined;
    const item = this.items[this.head];
    this.items[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this._size--;
    return item;
  }

  /** Oldest first, without removing anything */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this._size; i++) {
      const item = this.items[(this.head + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  drain(): T[] {
    const out: T[] = [];
    while (this._size > 0) {
      const item = this.shift();
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  clear(): void {
    this.items.fill(undefined);
    this.head = 0;
    this._size = 0;
  }
}
