// Maps
export {
  LinearMap,
  BucketedMap,
  GrowableHashMap,
  TrackedHashMap,
  type MapLike,
  type Entry,
} from "./map";

// Configuration
export {
  DEFAULT_REHASH_POLICY,
  type BucketedMapOptions,
  type GrowableHashMapOptions,
  type TrackedHashMapOptions,
  type RehashPolicy,
} from "./map";

// Instrumentation
export { OpCounter, type MapProbe } from "./map";

// Delta tracking
export { track_delta, type Delta, type Sized } from "./map";

// Hashing
export { hash_key, same_value_zero, type HashFn, type EqualsFn } from "./hashing";

// Errors
export { AppError, HashMapError, HASH_MAP_ERROR, is_hash_map_error } from "./utils/error";
export { TypeError, TYPE_ERROR } from "./type_primitives";
