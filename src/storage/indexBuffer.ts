const INITIAL_CAPACITY = 8;

/**
 * Growable `Uint32Array` used for the CSR row offsets and column indices.
 * Capacity doubles on overflow so appends stay amortised O(1); `view`
 * hands out zero-copy windows into the live buffer.
 */
export class IndexBuffer {
  private data: Uint32Array;
  private size = 0;

  constructor(capacity = INITIAL_CAPACITY) {
    this.data = new Uint32Array(Math.max(1, capacity));
  }

  get length(): number {
    return this.size;
  }

  get(index: number): number {
    return this.data[index];
  }

  set(index: number, value: number): void {
    this.data[index] = value;
  }

  push(value: number): void {
    this.reserve(this.size + 1);
    this.data[this.size] = value;
    this.size += 1;
  }

  /** Inserts `value` at `index`, shifting the tail right by one slot. */
  insert(index: number, value: number): void {
    this.reserve(this.size + 1);
    this.data.copyWithin(index + 1, index, this.size);
    this.data[index] = value;
    this.size += 1;
  }

  /** Adds `delta` to every entry in `[start, length)`. */
  addFrom(start: number, delta: number): void {
    for (let index = start; index < this.size; index += 1) {
      this.data[index] += delta;
    }
  }

  /** Zero-copy window `[start, end)`; invalidated by the next growth. */
  view(start: number, end: number): Uint32Array {
    return this.data.subarray(start, end);
  }

  /** Sets every entry to zero, keeping the length. */
  zero(): void {
    this.data.fill(0, 0, this.size);
  }

  clear(): void {
    this.size = 0;
  }

  toArray(): number[] {
    return Array.from(this.data.subarray(0, this.size));
  }

  /** Grows the backing array so `required` entries fit without reallocating. */
  reserve(required: number): void {
    if (required <= this.data.length) {
      return;
    }
    let capacity = this.data.length;
    while (capacity < required) {
      capacity *= 2;
    }
    const next = new Uint32Array(capacity);
    next.set(this.data.subarray(0, this.size));
    this.data = next;
  }
}
