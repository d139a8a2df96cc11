export { BucketedMap } from "./bucketed_map";
export { track_delta, type Delta, type Sized } from "./delta";
export { GrowableHashMap } from "./growable_hash_map";
export { LinearMap } from "./linear_map";
export {
  DEFAULT_REHASH_POLICY,
  type BucketedMapOptions,
  type GrowableHashMapOptions,
  type RehashPolicy,
  type TrackedHashMapOptions,
} from "./options";
export { OpCounter, type MapProbe } from "./probe";
export { TrackedHashMap } from "./tracked_hash_map";
export type { Entry, MapLike } from "./types";
