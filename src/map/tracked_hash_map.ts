/***
 *
 * TrackedHashMap — GrowableHashMap with an O(1) running entry count
 *
 * Every size-affecting operation goes through `tracked`: it reads the size
 * of the one bucket the key routes to, performs the bucket-level mutation,
 * and adds the bucket's size delta to the count. A put therefore adds +1
 * for a new key and 0 for an overwrite without asking first whether the key
 * was present; a remove adds -1 or 0 the same way.
 *
 * With the count O(1), the growth check after each put is O(1) too, and
 * n insertions cost O(n) in total including rehashes.
 *
 * Invariant: outside of put/remove, `size` equals the summed size of all
 * buckets (`naive_size()`).
 *
 ***/

import { track_delta } from "./delta";
import { GrowableHashMap } from "./growable_hash_map";
import type { LinearMap } from "./linear_map";
import {
  resolve_rehash_policy,
  type RehashPolicy,
  type TrackedHashMapOptions,
} from "./options";
import type { Entry, MapLike } from "./types";

export class TrackedHashMap<K, V> implements MapLike<K, V> {
  readonly rehash_policy: RehashPolicy;

  private readonly _inner: GrowableHashMap<K, V>;
  private _size = 0;

  constructor(options: TrackedHashMapOptions<K> = {}) {
    this.rehash_policy = resolve_rehash_policy(options.rehash_policy);
    this._inner = new GrowableHashMap<K, V>(options);
  }

  /** O(1). */
  get size(): number {
    return this._size;
  }

  /** O(bucket_count) recount, for validation only. */
  naive_size(): number {
    return this._inner.size;
  }

  get bucket_count(): number {
    return this._inner.bucket_count;
  }

  get load_factor(): number {
    return this._inner.load_factor;
  }

  get(key: K): V | undefined {
    return this._inner.get(key);
  }

  contains_key(key: K): boolean {
    return this._inner.contains_key(key);
  }

  put(key: K, value: V): V | undefined {
    const previous = this.tracked(key, (bucket) => bucket.put(key, value));
    while (this._inner.should_grow(this._size)) this.grow();
    return previous;
  }

  remove(key: K): V | undefined {
    return this.tracked(key, (bucket) => bucket.remove(key));
  }

  clear(): void {
    this._inner.clear();
    this._size = 0;
  }

  //=========================================================
  // Iteration
  //=========================================================

  for_each(fn: (key: K, value: V) => void): void {
    this._inner.for_each(fn);
  }

  keys(): IterableIterator<K> {
    return this._inner.keys();
  }

  values(): IterableIterator<V> {
    return this._inner.values();
  }

  entries(): IterableIterator<Entry<K, V>> {
    return this._inner.entries();
  }

  [Symbol.iterator](): IterableIterator<Entry<K, V>> {
    return this._inner.entries();
  }

  //=========================================================
  // Internal
  //=========================================================

  private tracked<R>(key: K, mutate: (bucket: LinearMap<K, V>) => R): R {
    // bucket_for validates the key, so a rejected key never reaches mutate
    const { result, delta } = track_delta(
      this._inner.table.bucket_for(key),
      mutate,
    );
    this._size += delta;
    return result;
  }

  private grow(): void {
    if (this.rehash_policy === "recount") {
      this._size = 0;
      this._size += this._inner.rehash();
    } else {
      this._inner.rehash();
    }
  }
}
