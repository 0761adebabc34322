import { RingBuffer } from "../lib/ring-buffer.js";

/** Arithmetic mean of the last `min(window, values.length)` entries; 0 when empty. */
export function movingAverage(values: readonly number[], window: number): number {
  const n = Math.min(window, values.length);
  if (n <= 0) return 0;
  let sum = 0;
  for (let i = values.length - n; i < values.length; i++) {
    sum += values[i];
  }
  return sum / n;
}

export class RollingHistory {
  private buffer: RingBuffer<number>;

  constructor(capacity: number) {
    this.buffer = new RingBuffer(capacity);
  }

  /** Replace the contents with `count` copies of `price` so averages are defined from the first tick. */
  seed(price: number, count: number): void {
    this.buffer.clear();
    for (let i = 0; i < count; i++) {
      this.buffer.push(price);
    }
  }

  append(price: number): void {
    this.buffer.push(price);
  }

  values(): number[] {
    return this.buffer.toArray();
  }
}
