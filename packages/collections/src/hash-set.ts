/**
 * HashSet<K> — A set backed by hash bucketing using Eq<K> + Hash<K>.
 *
 * API mirrors native Set<K>. Iteration follows insertion order, so two sets
 * built from the same sequence of `add` calls enumerate identically.
 */

import type { Eq, Hash } from "./typeclasses.js";

export class HashSet<K> {
  private readonly _eq: Eq<K>;
  private readonly _hash: Hash<K>;
  private readonly _buckets = new Map<number, K[]>();
  private readonly _order: K[] = [];

  constructor(eq: Eq<K>, hash: Hash<K>, values?: Iterable<K>) {
    this._eq = eq;
    this._hash = hash;
    if (values) {
      for (const k of values) this.add(k);
    }
  }

  get size(): number {
    return this._order.length;
  }

  private _find(bucket: K[] | undefined, k: K): K | undefined {
    if (!bucket) return undefined;
    return bucket.find((stored) => this._eq.equals(k, stored));
  }

  has(k: K): boolean {
    const bucket = this._buckets.get(this._hash.hash(k));
    return bucket !== undefined && bucket.some((stored) => this._eq.equals(k, stored));
  }

  /** The stored element equal to `k`, if any. */
  get(k: K): K | undefined {
    return this._find(this._buckets.get(this._hash.hash(k)), k);
  }

  add(k: K): this {
    this.insert(k);
    return this;
  }

  /** Add `k` and report whether it was absent before. */
  insert(k: K): boolean {
    const h = this._hash.hash(k);
    const bucket = this._buckets.get(h);
    if (!bucket) {
      this._buckets.set(h, [k]);
    } else if (this._find(bucket, k) === undefined) {
      bucket.push(k);
    } else {
      return false;
    }
    this._order.push(k);
    return true;
  }

  delete(k: K): boolean {
    const h = this._hash.hash(k);
    const bucket = this._buckets.get(h);
    if (!bucket) return false;
    const i = bucket.findIndex((stored) => this._eq.equals(k, stored));
    if (i < 0) return false;
    const [removed] = bucket.splice(i, 1);
    if (bucket.length === 0) this._buckets.delete(h);
    this._order.splice(this._order.indexOf(removed), 1);
    return true;
  }

  clear(): void {
    this._buckets.clear();
    this._order.length = 0;
  }

  [Symbol.iterator](): IterableIterator<K> {
    return this._order[Symbol.iterator]();
  }

  values(): IterableIterator<K> {
    return this[Symbol.iterator]();
  }

  forEach(fn: (value: K) => void): void {
    for (const k of this) fn(k);
  }

  toArray(): K[] {
    return [...this._order];
  }

  /** Elements also present in `other`, in this set's order. */
  intersection(other: HashSet<K>): HashSet<K> {
    return new HashSet(
      this._eq,
      this._hash,
      this._order.filter((k) => other.has(k))
    );
  }
}
