/**
 * HashMap<K, V> — A map backed by hash bucketing using Eq<K> + Hash<K>.
 *
 * API mirrors native Map<K, V>. Keys enumerate in first-insertion order;
 * overwriting a value keeps the key's position.
 */

import type { Eq, Hash } from "./typeclasses.js";

interface Entry<K, V> {
  readonly key: K;
  value: V;
}

export class HashMap<K, V> {
  private readonly _eq: Eq<K>;
  private readonly _hash: Hash<K>;
  private readonly _buckets = new Map<number, Entry<K, V>[]>();
  private readonly _order: Entry<K, V>[] = [];

  constructor(eq: Eq<K>, hash: Hash<K>) {
    this._eq = eq;
    this._hash = hash;
  }

  get size(): number {
    return this._order.length;
  }

  private _findEntry(k: K): Entry<K, V> | undefined {
    const bucket = this._buckets.get(this._hash.hash(k));
    return bucket?.find((entry) => this._eq.equals(k, entry.key));
  }

  get(k: K): V | undefined {
    return this._findEntry(k)?.value;
  }

  has(k: K): boolean {
    return this._findEntry(k) !== undefined;
  }

  set(k: K, v: V): this {
    const entry = this._findEntry(k);
    if (entry) {
      entry.value = v;
      return this;
    }
    const created: Entry<K, V> = { key: k, value: v };
    const h = this._hash.hash(k);
    const bucket = this._buckets.get(h);
    if (bucket) {
      bucket.push(created);
    } else {
      this._buckets.set(h, [created]);
    }
    this._order.push(created);
    return this;
  }

  /** Value for `k`, created with `init` and stored when absent. */
  getOrInsert(k: K, init: () => V): V {
    const entry = this._findEntry(k);
    if (entry) return entry.value;
    const value = init();
    this.set(k, value);
    return value;
  }

  delete(k: K): boolean {
    const h = this._hash.hash(k);
    const bucket = this._buckets.get(h);
    if (!bucket) return false;
    const i = bucket.findIndex((entry) => this._eq.equals(k, entry.key));
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

  *entries(): IterableIterator<[K, V]> {
    for (const { key, value } of this._order) yield [key, value];
  }

  *keys(): IterableIterator<K> {
    for (const { key } of this._order) yield key;
  }

  *values(): IterableIterator<V> {
    for (const { value } of this._order) yield value;
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  forEach(fn: (value: V, key: K) => void): void {
    for (const [k, v] of this) fn(v, k);
  }

  getOrElse(k: K, fallback: V): V {
    const entry = this._findEntry(k);
    return entry ? entry.value : fallback;
  }
}
