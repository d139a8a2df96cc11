export {
  fnv1a,
  hash_key,
  identity_hash,
  same_value_zero,
  type EqualsFn,
  type HashFn,
} from "./hash";
