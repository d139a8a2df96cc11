import { describe, expect, it } from "vitest";
import {
  assert,
  is_finite_number,
  is_positive_finite,
  is_positive_integer,
} from "../assertions";
import { TypeError, TYPE_ERROR } from "../error";

describe("assertions", () => {
  //=========================================================
  // predicates
  //=========================================================

  it("is_positive_integer", () => {
    expect(is_positive_integer(1)).toBe(true);
    expect(is_positive_integer(1024)).toBe(true);
    expect(is_positive_integer(0)).toBe(false);
    expect(is_positive_integer(-3)).toBe(false);
    expect(is_positive_integer(2.5)).toBe(false);
    expect(is_positive_integer(NaN)).toBe(false);
  });

  it("is_positive_finite", () => {
    expect(is_positive_finite(0.75)).toBe(true);
    expect(is_positive_finite(3)).toBe(true);
    expect(is_positive_finite(0)).toBe(false);
    expect(is_positive_finite(-1)).toBe(false);
    expect(is_positive_finite(Infinity)).toBe(false);
    expect(is_positive_finite(NaN)).toBe(false);
  });

  it("is_finite_number", () => {
    expect(is_finite_number(0)).toBe(true);
    expect(is_finite_number(-12.5)).toBe(true);
    expect(is_finite_number(NaN)).toBe(false);
    expect(is_finite_number(Infinity)).toBe(false);
    expect(is_finite_number("1")).toBe(false);
    expect(is_finite_number(undefined)).toBe(false);
  });

  //=========================================================
  // assert
  //=========================================================

  it("assert does not throw when condition passes", () => {
    expect(() => assert(5, is_finite_number, "finite")).not.toThrow();
  });

  it("assert throws TypeError when condition fails", () => {
    expect(() => assert(NaN, is_finite_number, "finite")).toThrow(TypeError);
  });

  it("assert error carries category, message and value", () => {
    let caught: unknown;
    try {
      assert<unknown, number>("x", is_finite_number, "must be a finite number");
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(TypeError);
    const err = caught as TypeError;
    expect(err.category).toBe(TYPE_ERROR.ASSERTION_FAIL_CONDITION);
    expect(err.message).toBe(
      "Expected value to meet condition: must be a finite number",
    );
    expect(err.context).toEqual({ value: "x" });
    expect(err.is_operational).toBe(false);
  });
});
