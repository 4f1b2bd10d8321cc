/**
 * Fixed-capacity FIFO of numbers. Pushing into a full window evicts the oldest value.
 */
export class RollingWindow {
  private readonly buffer: number[];
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RollingWindow capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<number>(capacity).fill(0);
  }

  push(value: number): void {
    if (this.count < this.capacity) {
      this.buffer[(this.start + this.count) % this.capacity] = value;
      this.count++;
      return;
    }
    this.buffer[this.start] = value;
    this.start = (this.start + 1) % this.capacity;
  }

  get size(): number {
    return this.count;
  }

  average(): number | null {
    if (this.count === 0) return null;
    let sum = 0;
    for (let i = 0; i < this.count; i++) {
      sum += this.buffer[(this.start + i) % this.capacity];
    }
    return sum / this.count;
  }
}
