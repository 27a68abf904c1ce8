/**
 * Fixed-capacity numeric buffer. Pushing into a full buffer evicts the oldest value.
 */
export class RingBuffer {
  private readonly values: Float64Array;
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.values = new Float64Array(capacity);
  }

  get size(): number {
    return this.count;
  }

  push(value: number): void {
    if (this.count < this.capacity) {
      this.values[(this.start + this.count) % this.capacity] = value;
      this.count++;
      return;
    }
    this.values[this.start] = value;
    this.start = (this.start + 1) % this.capacity;
  }

  /**
   * Arithmetic mean of the buffered values, 0 when empty.
   */
  mean(): number {
    if (this.count === 0) return 0;
    let sum = 0;
    for (let i = 0; i < this.count; i++) {
      sum += this.values[(this.start + i) % this.capacity] ?? 0;
    }
    return sum / this.count;
  }

  /** Buffered values, oldest first */
  toArray(): number[] {
    const out: number[] = [];
    for (let i = 0; i < this.count; i++) {
      out.push(this.values[(this.start + i) % this.capacity] ?? 0);
    }
    return out;
  }
}
