/***
 *
 * GrowableHashMap — BucketedMap with a doubling rehash policy
 *
 * Wraps a BucketedMap table. After every put, if the entry count exceeds
 * bucket_count × load_factor, the table is replaced by one with
 * GROWTH_FACTOR times as many buckets and every entry is re-put into it.
 *
 * The growth check here reads the table's summed `size`, which makes each
 * put O(bucket_count) and n insertions O(n²) in total. TrackedHashMap
 * wraps this class and feeds should_grow an O(1) count instead.
 *
 ***/

import { hash_key, same_value_zero, type EqualsFn, type HashFn } from "hashing";
import { GROWTH_FACTOR } from "utils/constants";
import { BucketedMap } from "./bucketed_map";
import { track_delta } from "./delta";
import {
  resolve_bucket_count,
  resolve_load_factor,
  type GrowableHashMapOptions,
} from "./options";
import type { MapProbe } from "./probe";
import type { Entry, MapLike } from "./types";

export class GrowableHashMap<K, V> implements MapLike<K, V> {
  readonly load_factor: number;

  private _table: BucketedMap<K, V>;
  private readonly _hash: HashFn<K>;
  private readonly _equals: EqualsFn<K>;
  private readonly _probe: MapProbe | undefined;

  constructor(options: GrowableHashMapOptions<K> = {}) {
    const bucket_count = resolve_bucket_count(
      options.initial_bucket_count,
      "initial_bucket_count",
    );
    this.load_factor = resolve_load_factor(options.load_factor);
    this._hash = options.hash ?? hash_key;
    this._equals = options.equals ?? same_value_zero;
    this._probe = options.probe;
    this._table = this.make_table(bucket_count);
  }

  /** The current table. Replaced wholesale on every rehash. */
  get table(): BucketedMap<K, V> {
    return this._table;
  }

  get bucket_count(): number {
    return this._table.bucket_count;
  }

  /** Naive total from the table: O(bucket_count). */
  get size(): number {
    return this._table.size;
  }

  get(key: K): V | undefined {
    return this._table.get(key);
  }

  contains_key(key: K): boolean {
    return this._table.contains_key(key);
  }

  put(key: K, value: V): V | undefined {
    const previous = this._table.put(key, value);
    while (this.should_grow(this.size)) this.rehash();
    return previous;
  }

  remove(key: K): V | undefined {
    return this._table.remove(key);
  }

  clear(): void {
    this._table.clear();
  }

  //=========================================================
  // Growth
  //=========================================================

  should_grow(entry_count: number): boolean {
    return entry_count > this._table.bucket_count * this.load_factor;
  }

  /**
   * Move every entry into a table with GROWTH_FACTOR times the buckets.
   * Returns how many entries the new table gained, summed from per-bucket
   * deltas as the entries are re-put; it always equals the entry count.
   */
  rehash(): number {
    const old_table = this._table;
    const next_table = this.make_table(old_table.bucket_count * GROWTH_FACTOR);
    let inserted = 0;
    for (const [key, value] of old_table) {
      inserted += track_delta(next_table.bucket_for(key), (bucket) =>
        bucket.put(key, value),
      ).delta;
    }
    this._table = next_table;
    this._probe?.rehashed(old_table.bucket_count, next_table.bucket_count);
    return inserted;
  }

  //=========================================================
  // Iteration
  //=========================================================

  for_each(fn: (key: K, value: V) => void): void {
    this._table.for_each(fn);
  }

  keys(): IterableIterator<K> {
    return this._table.keys();
  }

  values(): IterableIterator<V> {
    return this._table.values();
  }

  entries(): IterableIterator<Entry<K, V>> {
    return this._table.entries();
  }

  [Symbol.iterator](): IterableIterator<Entry<K, V>> {
    return this._table.entries();
  }

  //=========================================================
  // Internal
  //=========================================================

  private make_table(bucket_count: number): BucketedMap<K, V> {
    return new BucketedMap<K, V>({
      bucket_count,
      hash: this._hash,
      equals: this._equals,
      probe: this._probe,
    });
  }
}
