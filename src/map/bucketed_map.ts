/***
 *
 * BucketedMap — fixed-size array of LinearMap buckets
 *
 * choose_map routes every key to exactly one bucket with
 * hash(key) mod bucket_count, a pure function of the key and the current
 * bucket count, and every keyed operation delegates to that bucket
 * unchanged.
 *
 * `size` sums the buckets and is O(bucket_count). It is the naive baseline:
 * nothing on an insertion path may call it (TrackedHashMap keeps its own
 * count instead).
 *
 * Key policy: null and undefined keys are rejected in choose_map, the one
 * place every keyed operation passes through, before anything is mutated.
 *
 ***/

import { hash_key, same_value_zero, type EqualsFn, type HashFn } from "hashing";
import { assert, is_finite_number } from "type_primitives";
import { HASH_MAP_ERROR, HashMapError } from "utils/error";
import { LinearMap } from "./linear_map";
import { resolve_bucket_count, type BucketedMapOptions } from "./options";
import type { MapProbe } from "./probe";
import type { Entry, MapLike } from "./types";

export class BucketedMap<K, V> implements MapLike<K, V> {
  private readonly _buckets: LinearMap<K, V>[];
  private readonly _hash: HashFn<K>;
  private readonly _probe: MapProbe | undefined;

  constructor(options: BucketedMapOptions<K> = {}) {
    const bucket_count = resolve_bucket_count(options.bucket_count);
    const equals: EqualsFn<K> = options.equals ?? same_value_zero;
    this._hash = options.hash ?? hash_key;
    this._probe = options.probe;
    this._buckets = Array.from(
      { length: bucket_count },
      () => new LinearMap<K, V>(equals),
    );
  }

  get bucket_count(): number {
    return this._buckets.length;
  }

  /** Live view of the buckets. Do not mutate. */
  get buckets(): readonly LinearMap<K, V>[] {
    return this._buckets;
  }

  /** Naive total: O(bucket_count). Keep off hot paths. */
  get size(): number {
    let total = 0;
    for (const bucket of this._buckets) {
      this._probe?.bucket_visited();
      total += bucket.size;
    }
    return total;
  }

  //=========================================================
  // Routing
  //=========================================================

  choose_map(key: K): number {
    if (key === null || key === undefined) {
      throw new HashMapError(
        HASH_MAP_ERROR.INVALID_KEY,
        `Keys must not be null or undefined, got ${String(key)}`,
        { key },
      );
    }
    const h: unknown = this._hash(key);
    assert(h, is_finite_number, "hash function must return a finite number");
    // >>> 0 folds negative and oversized hashes into the unsigned 32-bit range
    return (h >>> 0) % this._buckets.length;
  }

  bucket_for(key: K): LinearMap<K, V> {
    const index = this.choose_map(key);
    this._probe?.bucket_visited();
    return this._buckets[index];
  }

  //=========================================================
  // Keyed operations
  //=========================================================

  get(key: K): V | undefined {
    return this.bucket_for(key).get(key);
  }

  contains_key(key: K): boolean {
    return this.bucket_for(key).contains_key(key);
  }

  put(key: K, value: V): V | undefined {
    return this.bucket_for(key).put(key, value);
  }

  remove(key: K): V | undefined {
    return this.bucket_for(key).remove(key);
  }

  /** Empties every bucket; the bucket count is kept. */
  clear(): void {
    for (const bucket of this._buckets) bucket.clear();
  }

  //=========================================================
  // Iteration
  //=========================================================

  for_each(fn: (key: K, value: V) => void): void {
    for (const bucket of this._buckets) {
      this._probe?.bucket_visited();
      bucket.for_each(fn);
    }
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.entries()) yield key;
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) yield value;
  }

  *entries(): IterableIterator<Entry<K, V>> {
    for (const bucket of this._buckets) {
      this._probe?.bucket_visited();
      yield* bucket.entries();
    }
  }

  [Symbol.iterator](): IterableIterator<Entry<K, V>> {
    return this.entries();
  }
}
