/***
 * Options — configuration for each map layer, with defaults and validation.
 *
 * Validation runs in every build and before any state is allocated,
 * so a rejected constructor call leaves nothing behind.
 *
 ***/

import type { EqualsFn, HashFn } from "hashing";
import { is_positive_finite, is_positive_integer } from "type_primitives";
import { DEFAULT_BUCKET_COUNT, DEFAULT_LOAD_FACTOR } from "utils/constants";
import { HASH_MAP_ERROR, HashMapError } from "utils/error";
import type { MapProbe } from "./probe";

/**
 * How TrackedHashMap keeps its counter across a rehash.
 *  - "carry":   leave it alone; a rehash only redistributes entries.
 *  - "recount": reset it to 0 and take the number of entries the
 *               redistribution inserted into the new table.
 */
export type RehashPolicy = "carry" | "recount";

export const DEFAULT_REHASH_POLICY: RehashPolicy = "carry";

export interface KeyOptions<K> {
  /** Defaults to hash_key. Must agree with `equals`. */
  hash?: HashFn<K>;
  /** Defaults to SameValueZero. */
  equals?: EqualsFn<K>;
  probe?: MapProbe;
}

export interface BucketedMapOptions<K> extends KeyOptions<K> {
  bucket_count?: number;
}

export interface GrowableHashMapOptions<K> extends KeyOptions<K> {
  initial_bucket_count?: number;
  /** Maximum average bucket occupancy before the table doubles. */
  load_factor?: number;
}

export interface TrackedHashMapOptions<K> extends GrowableHashMapOptions<K> {
  rehash_policy?: RehashPolicy;
}

function invalid_option(option: string, value: unknown, expected: string): HashMapError {
  return new HashMapError(
    HASH_MAP_ERROR.INVALID_OPTION,
    `Option "${option}" must be ${expected}, got ${String(value)}`,
    { option, value },
  );
}

export function resolve_bucket_count(
  value: number | undefined,
  option = "bucket_count",
): number {
  const count = value ?? DEFAULT_BUCKET_COUNT;
  if (!is_positive_integer(count)) {
    throw invalid_option(option, count, "a positive integer");
  }
  return count;
}

export function resolve_load_factor(value: number | undefined): number {
  const factor = value ?? DEFAULT_LOAD_FACTOR;
  if (!is_positive_finite(factor)) {
    throw invalid_option("load_factor", factor, "a positive finite number");
  }
  return factor;
}

const is_rehash_policy = (v: string): v is RehashPolicy =>
  v === "carry" || v === "recount";

export function resolve_rehash_policy(value: string | undefined): RehashPolicy {
  const policy = value ?? DEFAULT_REHASH_POLICY;
  if (!is_rehash_policy(policy)) {
    throw invalid_option("rehash_policy", policy, `"carry" or "recount"`);
  }
  return policy;
}
