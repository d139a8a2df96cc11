export const NOT_FOUND = -1;

// Table shape defaults: two buckets, rehash once entries exceed the bucket count
export const DEFAULT_BUCKET_COUNT = 2;
export const DEFAULT_LOAD_FACTOR = 1.0;
export const GROWTH_FACTOR = 2;

// FNV-1a hash constants (used for string keys)
export const FNV_OFFSET_BASIS = 0x811c9dc5;
export const FNV_PRIME = 0x01000193;

// Identity hashes for object keys start here; 0 is left for null-like values
export const FIRST_OBJECT_ID = 1;
