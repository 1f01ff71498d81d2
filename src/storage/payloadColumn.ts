/**
 * Growable column of node or edge weights that stays unallocated while it
 * only holds the "no payload" value (`undefined`). Weightless graphs therefore
 * pay nothing per node or per edge; the backing array materialises the first
 * time a real value is stored and the column behaves like a plain array from
 * then on.
 */
export class PayloadColumn<T> {
  private values: T[] | null = null;
  /** Holder of the unit value while {@link values} is not materialised. */
  private unit: { readonly value: T } | null = null;
  private size = 0;

  get length(): number {
    return this.size;
  }

  /** Whether a backing array has been allocated. */
  isAllocated(): boolean {
    return this.values !== null;
  }

  get(index: number): T {
    if (this.values) {
      return this.values[index];
    }
    if (!this.unit) {
      throw new RangeError(`payload index ${index} is out of range`);
    }
    return this.unit.value;
  }

  set(index: number, value: T): void {
    const values = this.prepare(value);
    if (values) {
      values[index] = value;
    }
  }

  push(value: T): void {
    this.prepare(value)?.push(value);
    this.size += 1;
  }

  insert(index: number, value: T): void {
    this.prepare(value)?.splice(index, 0, value);
    this.size += 1;
  }

  /** Appends `count` copies of `value`. */
  fill(count: number, value: T): void {
    const values = this.prepare(value);
    if (values) {
      for (let index = 0; index < count; index += 1) {
        values.push(value);
      }
    }
    this.size += count;
  }

  /** Copies the window `[start, end)`. */
  slice(start: number, end: number): T[] {
    if (this.values) {
      return this.values.slice(start, end);
    }
    const unit = this.unit;
    if (!unit || end <= start) {
      return [];
    }
    return Array.from({ length: end - start }, () => unit.value);
  }

  clear(): void {
    this.values = this.values ? [] : null;
    this.size = 0;
  }

  /**
   * Returns the backing array that must receive `value`, or `null` when the
   * column stays in unit mode. Storing a real value promotes the column.
   */
  private prepare(value: T): T[] | null {
    if (this.values) {
      return this.values;
    }
    if (value === undefined) {
      this.unit ??= { value };
      return null;
    }
    const unit = this.unit;
    this.values = unit ? Array.from({ length: this.size }, () => unit.value) : [];
    return this.values;
  }
}
