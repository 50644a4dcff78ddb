/**
 * Fixed-size, write-once result storage indexed by chunk sequence number.
 * Workers finish in any order; readers only ever see sequence order.
 */
export class ResultSlots<T> {
  private readonly values: (T | undefined)[];
  private readonly filled: boolean[];
  private discarded = false;

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 0) {
      throw new Error(`slot count must be a non-negative integer (got ${size})`);
    }
    this.values = new Array<T | undefined>(size).fill(undefined);
    this.filled = new Array<boolean>(size).fill(false);
  }

  /** Returns false once the slots were discarded; the value is dropped. */
  set(index: number, value: T): boolean {
    if (this.discarded) return false;
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new Error(`slot ${index} is out of range 0..${this.size - 1}`);
    }
    if (this.filled[index]) {
      throw new Error(`slot ${index} was already written`);
    }
    this.values[index] = value;
    this.filled[index] = true;
    return true;
  }

  get complete(): boolean {
    return !this.discarded && this.filled.every(Boolean);
  }

  /** Drops everything collected so far. Late writers are ignored. */
  discard() {
    this.discarded = true;
    this.values.fill(undefined);
  }

  toArray(): T[] {
    if (this.discarded) {
      throw new Error('results were discarded');
    }
    const out: T[] = [];
    for (let i = 0; i < this.size; i++) {
      const value = this.values[i];
      if (!this.filled[i] || value === undefined) {
        throw new Error(`slot ${i} is still empty`);
      }
      out.push(value);
    }
    return out;
  }
}
