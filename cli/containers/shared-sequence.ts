/**
 * Ordered sequence of 32-bit integers backed by a SharedArrayBuffer.
 *
 * Not synchronized: each container guards it with its own primitive.
 * The capacity is fixed when the buffer is allocated.
 *
 * @module
 */

const LENGTH = 0;
const HEADER = 1;

export class SharedSequence {
  private readonly view: Int32Array;

  constructor(readonly buffer: SharedArrayBuffer) {
    this.view = new Int32Array(buffer);
  }

  /**
   * Allocate an empty sequence able to hold `capacity` values.
   */
  static allocate(capacity: number): SharedSequence {
    return new SharedSequence(
      new SharedArrayBuffer((HEADER + capacity) * Int32Array.BYTES_PER_ELEMENT),
    );
  }

  get capacity(): number {
    return this.view.length - HEADER;
  }

  get length(): number {
    return this.view[LENGTH];
  }

  /**
   * @throws RangeError when the sequence is full
   */
  append(value: number): void {
    const length = this.view[LENGTH];
    if (length >= this.capacity) {
      throw new RangeError(`Sequence capacity of ${this.capacity} exceeded`);
    }
    this.view[HEADER + length] = value;
    this.view[LENGTH] = length + 1;
  }

  /**
   * The most recently appended value, or 0 when empty.
   */
  last(): number {
    const length = this.view[LENGTH];
    return length === 0 ? 0 : this.view[HEADER + length - 1];
  }

  clear(): void {
    this.view[LENGTH] = 0;
  }
}
