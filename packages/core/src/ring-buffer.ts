/**
 * Bounded ring buffer.
 *
 * Fixed capacity, oldest entries drop on overflow.
 * toArray() returns a frozen copy, oldest first.
 */

export class RingBuffer<T> {
  private readonly _items: (T | undefined)[];
  private readonly _capacity: number;
  private _head = 0;
  private _size = 0;

  constructor(capacity: number) {
    if (capacity < 1 || !Number.isInteger(capacity)) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this._capacity = capacity;
    this._items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this._size;
  }

  get capacity(): number {
    return this._capacity;
  }

  push(item: T): void {
    this._items[this._head] = item;
    this._head = (this._head + 1) % this._capacity;
    if (this._size < this._capacity) {
      this._size++;
    }
  }

  /**
   * The `n` most recent entries, oldest first.
   */
  latest(n: number): readonly T[] {
    const all = this.toArray();
    return all.slice(Math.max(0, all.length - n));
  }

  toArray(): readonly T[] {
    const result: T[] = [];
    const start = this._size < this._capacity ? 0 : this._head;
    for (let i = 0; i < this._size; i++) {
      const item = this._items[(start + i) % this._capacity];
      if (item !== undefined) result.push(item);
    }
    return Object.freeze(result);
  }

  clear(): void {
    this._items.fill(undefined);
    this._head = 0;
    this._size = 0;
  }
}
