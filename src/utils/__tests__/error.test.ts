import { describe, expect, it } from "vitest";
import {
  AppError,
  HashMapError,
  HASH_MAP_ERROR,
  is_hash_map_error,
} from "../error";

describe("HashMapError", () => {
  //=========================================================
  // Construction & properties
  //=========================================================

  it("stores the category", () => {
    const err = new HashMapError(HASH_MAP_ERROR.INVALID_KEY);
    expect(err.category).toBe(HASH_MAP_ERROR.INVALID_KEY);
  });

  it("uses category as default message when message is omitted", () => {
    const err = new HashMapError(HASH_MAP_ERROR.INVALID_OPTION);
    expect(err.message).toBe(HASH_MAP_ERROR.INVALID_OPTION);
  });

  it("uses provided message when given", () => {
    const err = new HashMapError(HASH_MAP_ERROR.INVALID_KEY, "no null keys");
    expect(err.message).toBe("no null keys");
  });

  it("is always operational", () => {
    const err = new HashMapError(HASH_MAP_ERROR.INVALID_KEY);
    expect(err.is_operational).toBe(true);
  });

  it("context is undefined when not provided", () => {
    const err = new HashMapError(HASH_MAP_ERROR.INVALID_OPTION);
    expect(err.context).toBeUndefined();
  });

  it("stores provided context", () => {
    const ctx = { option: "load_factor", value: -1 };
    const err = new HashMapError(HASH_MAP_ERROR.INVALID_OPTION, "bad", ctx);
    expect(err.context).toEqual({ option: "load_factor", value: -1 });
  });

  it("sets name to HashMapError", () => {
    const err = new HashMapError(HASH_MAP_ERROR.INVALID_KEY);
    expect(err.name).toBe("HashMapError");
  });

  //=========================================================
  // Inheritance
  //=========================================================

  it("is an instance of AppError and Error", () => {
    const err = new HashMapError(HASH_MAP_ERROR.INVALID_KEY);
    expect(err).toBeInstanceOf(AppError);
    expect(err).toBeInstanceOf(Error);
  });

  //=========================================================
  // is_hash_map_error guard
  //=========================================================

  it("is_hash_map_error returns true for HashMapError instances", () => {
    expect(is_hash_map_error(new HashMapError(HASH_MAP_ERROR.INVALID_KEY))).toBe(
      true,
    );
  });

  it("is_hash_map_error returns false for other values", () => {
    expect(is_hash_map_error(new Error("plain"))).toBe(false);
    expect(is_hash_map_error(null)).toBe(false);
    expect(is_hash_map_error(undefined)).toBe(false);
    expect(is_hash_map_error("string")).toBe(false);
    expect(is_hash_map_error({})).toBe(false);
  });
});
