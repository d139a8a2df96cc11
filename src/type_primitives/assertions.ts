/***
 * Assertions — Dev-only runtime validation and shared predicates.
 *
 * assert is guarded by __DEV__ and tree-shaken in production builds.
 * The predicates are plain functions and are also used by option
 * validation, which runs in every build.
 *
 ***/

import { TYPE_ERROR, TypeError } from "./error";

export const is_positive_integer = (v: number): boolean =>
  Number.isInteger(v) && v > 0;

export const is_positive_finite = (v: number): boolean =>
  Number.isFinite(v) && v > 0;

export const is_finite_number = (v: unknown): v is number =>
  typeof v === "number" && Number.isFinite(v);

export function assert<T, Result extends T = T>(
  value: T,
  condition: (v: T) => v is Result,
  err_message: string,
): asserts value is Result {
  if (__DEV__ && !condition(value)) {
    throw new TypeError(
      TYPE_ERROR.ASSERTION_FAIL_CONDITION,
      `Expected value to meet condition: ${err_message}`,
      { value },
    );
  }
}
