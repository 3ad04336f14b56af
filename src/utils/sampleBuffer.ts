// src/utils/sampleBuffer.ts
/**
 * FIFO ring buffer of numbers that grows when full.
 * push() appends at the back, shift() removes from the front, both O(1) amortized.
 */
export class SampleBuffer implements Iterable<number> {
  private buf: number[];
  private head = 0;
  private size = 0;

  constructor(capacity = 16) {
    if (!Number.isInteger(capacity) || capacity <= 0) throw new Error(`capacity must be a positive integer (got ${capacity})`);
    this.buf = new Array<number>(capacity).fill(0);
  }

  get length(): number {
    return this.size;
  }

  push(value: number): void {
    if (this.size === this.buf.length) this.grow();
    this.buf[(this.head + this.size) % this.buf.length] = value;
    this.size += 1;
  }

  shift(): number | undefined {
    if (this.size === 0) return undefined;
    const value = this.buf[this.head];
    this.head = (this.head + 1) % this.buf.length;
    this.size -= 1;
    return value;
  }

  /** Negative indices count from the back. */
  at(index: number): number | undefined {
    const i = index < 0 ? this.size + index : index;
    if (!Number.isInteger(i) || i < 0 || i >= this.size) return undefined;
    return this.buf[(this.head + i) % this.buf.length];
  }

  slice(start?: number, end?: number): number[] {
    return this.toArray().slice(start, end);
  }

  toArray(): number[] {
    const out = new Array<number>(this.size);
    for (let i = 0; i < this.size; i++) out[i] = this.buf[(this.head + i) % this.buf.length];
    return out;
  }

  equals(other: SampleBuffer): boolean {
    if (this.size !== other.size) return false;
    for (let i = 0; i < this.size; i++) {
      if (this.at(i) !== other.at(i)) return false;
    }
    return true;
  }

  *[Symbol.iterator](): Iterator<number> {
    for (let i = 0; i < this.size; i++) yield this.buf[(this.head + i) % this.buf.length];
  }

  private grow(): void {
    this.buf = this.toArray().concat(new Array<number>(this.buf.length).fill(0));
    this.head = 0;
  }
}
