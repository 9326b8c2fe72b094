/**
 * @yieldmesh/ledger: Ordered set.
 *
 * Insertion-ordered set with O(1) membership and O(1) removal.
 * Removal moves the last element into the vacated slot (swap-and-pop),
 * so enumeration order after a removal is deterministic but NOT the
 * original insertion order. Callers that loop over a set (the withdrawal
 * path) depend on this exact order.
 */

export class OrderedSet<T> implements Iterable<T> {
  private readonly _values: T[] = [];
  private readonly _index: Map<T, number> = new Map();

  constructor(values?: Iterable<T>) {
    if (values !== undefined) {
      for (const value of values) {
        this.add(value);
      }
    }
  }

  get size(): number {
    return this._values.length;
  }

  has(value: T): boolean {
    return this._index.has(value);
  }

  /**
   * Add a value. Returns false if it was already present.
   */
  add(value: T): boolean {
    if (this._index.has(value)) {
      return false;
    }
    this._index.set(value, this._values.length);
    this._values.push(value);
    return true;
  }

  /**
   * Remove a value. Returns false if it was not present.
   */
  remove(value: T): boolean {
    const index = this._index.get(value);
    if (index === undefined) {
      return false;
    }

    const lastIndex = this._values.length - 1;
    const last = this._values[lastIndex];
    if (index !== lastIndex && last !== undefined) {
      this._values[index] = last;
      this._index.set(last, index);
    }

    this._values.pop();
    this._index.delete(value);
    return true;
  }

  at(index: number): T | undefined {
    return this._values[index];
  }

  values(): readonly T[] {
    return [...this._values];
  }

  clone(): OrderedSet<T> {
    return new OrderedSet(this._values);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.values()[Symbol.iterator]();
  }
}
