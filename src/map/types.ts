/***
 * MapLike — the capability surface shared by every map layer.
 *
 * Each layer wraps the one below it and implements the same interface,
 * overriding only the operations whose behaviour it changes.
 * Absent keys read as `undefined`; contains_key tells a missing key
 * apart from one mapped to `undefined`.
 *
 ***/

export type Entry<K, V> = [key: K, value: V];

export interface MapLike<K, V> extends Iterable<Entry<K, V>> {
  readonly size: number;

  get(key: K): V | undefined;

  /** Insert or overwrite. Returns the previous value, if any. */
  put(key: K, value: V): V | undefined;

  /** Returns the removed value, if any. */
  remove(key: K): V | undefined;

  contains_key(key: K): boolean;

  clear(): void;

  keys(): IterableIterator<K>;
  values(): IterableIterator<V>;
  entries(): IterableIterator<Entry<K, V>>;
  for_each(fn: (key: K, value: V) => void): void;
}
