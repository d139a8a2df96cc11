/***
 *
 * Hash — default key hashing and equality for the bucketed maps
 *
 * Safe integers fold to their unsigned 32-bit value, so small integer keys
 * land in bucket `key % bucket_count`. Strings (and the string form of
 * floats, bigints and symbols) go through FNV-1a. Objects and functions get
 * a stable identity id on first sight, held weakly.
 *
 * Equality defaults to SameValueZero, the rule the built-in Map uses:
 * NaN equals NaN and +0 equals -0. hash_key agrees with it on both.
 *
 ***/

import {
  FIRST_OBJECT_ID,
  FNV_OFFSET_BASIS,
  FNV_PRIME,
} from "utils/constants";

export type HashFn<K> = (key: K) => number;
export type EqualsFn<K> = (a: K, b: K) => boolean;

const object_ids = new WeakMap<object, number>();
let next_object_id = FIRST_OBJECT_ID;

export function fnv1a(text: string): number {
  let h = FNV_OFFSET_BASIS;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, FNV_PRIME);
  }
  return h >>> 0;
}

export function identity_hash(obj: object): number {
  let id = object_ids.get(obj);
  if (id === undefined) {
    id = next_object_id++;
    object_ids.set(obj, id);
  }
  return id;
}

export function hash_key(key: unknown): number {
  switch (typeof key) {
    case "number":
      // -0 >>> 0 === 0, so both zeros share a bucket
      return Number.isSafeInteger(key) ? key >>> 0 : fnv1a(String(key));
    case "string":
      return fnv1a(key);
    case "boolean":
      return key ? 1 : 0;
    case "bigint":
      return fnv1a(key.toString());
    case "symbol":
      return fnv1a(key.toString());
    case "object":
      return key === null ? 0 : identity_hash(key);
    default:
      return typeof key === "function" ? identity_hash(key) : 0;
  }
}

export function same_value_zero<K>(a: K, b: K): boolean {
  // x !== x only holds for NaN
  return a === b || (a !== a && b !== b);
}
