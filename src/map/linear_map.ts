/***
 *
 * LinearMap — unordered association list over a dense entry array
 *
 * Lookup is a linear scan under the injected equality, so every operation
 * is O(k) in this map's own entry count. It is meant to stay small: a
 * bucket of a hashed table holds about size / bucket_count entries.
 * Removal uses swap-and-pop, so entry order is not preserved.
 *
 ***/

import { same_value_zero, type EqualsFn } from "hashing";
import { NOT_FOUND } from "utils/constants";
import type { Entry, MapLike } from "./types";

export class LinearMap<K, V> implements MapLike<K, V> {
  private readonly _entries: Entry<K, V>[] = [];

  constructor(private readonly _equals: EqualsFn<K> = same_value_zero) {}

  /** O(1): the entry array's own length. */
  get size(): number {
    return this._entries.length;
  }

  /** Dense index of `key`, or NOT_FOUND. */
  find_index(key: K): number {
    const entries = this._entries;
    for (let i = 0; i < entries.length; i++) {
      if (this._equals(entries[i][0], key)) return i;
    }
    return NOT_FOUND;
  }

  get(key: K): V | undefined {
    const i = this.find_index(key);
    return i === NOT_FOUND ? undefined : this._entries[i][1];
  }

  contains_key(key: K): boolean {
    return this.find_index(key) !== NOT_FOUND;
  }

  put(key: K, value: V): V | undefined {
    const i = this.find_index(key);
    if (i === NOT_FOUND) {
      this._entries.push([key, value]);
      return undefined;
    }
    const entry = this._entries[i];
    const previous = entry[1];
    entry[1] = value;
    return previous;
  }

  remove(key: K): V | undefined {
    const i = this.find_index(key);
    if (i === NOT_FOUND) return undefined;
    const entries = this._entries;
    const removed = entries[i][1];
    entries[i] = entries[entries.length - 1];
    entries.pop();
    return removed;
  }

  clear(): void {
    this._entries.length = 0;
  }

  for_each(fn: (key: K, value: V) => void): void {
    const entries = this._entries;
    for (let i = 0; i < entries.length; i++) {
      fn(entries[i][0], entries[i][1]);
    }
  }

  *keys(): IterableIterator<K> {
    for (const entry of this._entries) yield entry[0];
  }

  *values(): IterableIterator<V> {
    for (const entry of this._entries) yield entry[1];
  }

  /** Yields copies, so callers cannot rewrite stored entries. */
  *entries(): IterableIterator<Entry<K, V>> {
    for (const entry of this._entries) yield [entry[0], entry[1]];
  }

  [Symbol.iterator](): IterableIterator<Entry<K, V>> {
    return this.entries();
  }
}
