/***
 * track_delta — measure a sized target around a delegated mutation.
 *
 * The caller does not need to know in advance whether the mutation grows,
 * shrinks or leaves the target alone: it reads `size` before and after and
 * gets the difference back with the mutation's own result. Only the one
 * target is measured, so the cost is two O(1) size reads.
 *
 ***/

export interface Sized {
  readonly size: number;
}

export interface Delta<R> {
  readonly result: R;
  readonly delta: number;
}

export function track_delta<S extends Sized, R>(
  target: S,
  mutate: (target: S) => R,
): Delta<R> {
  const before = target.size;
  const result = mutate(target);
  return { result, delta: target.size - before };
}
