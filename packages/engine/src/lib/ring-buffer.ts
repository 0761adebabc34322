/** Fixed-capacity FIFO; pushing onto a full buffer evicts the oldest entry. */
export class RingBuffer<T> {
  private items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  get length(): number {
    return this.items.length;
  }

  /** Oldest first. */
  toArray(): T[] {
    return [...this.items];
  }

  /** The `n` most recent entries, newest first. */
  newest(n: number): T[] {
    if (n <= 0) return [];
    return this.items.slice(-n).reverse();
  }

  /** The `n` most recent entries, oldest first. */
  latest(n: number): T[] {
    if (n <= 0) return [];
    return this.items.slice(-n);
  }

  clear(): void {
    this.items = [];
  }
}
