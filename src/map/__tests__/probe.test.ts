import { describe, expect, it } from "vitest";
import { OpCounter } from "../probe";

describe("OpCounter", () => {
  it("counts visits and rehashes", () => {
    const c = new OpCounter();
    c.bucket_visited();
    c.bucket_visited();
    c.rehashed(2, 4);
    expect(c.bucket_ops).toBe(2);
    expect(c.rehashes).toBe(1);
    expect(c.growth).toEqual([4]);
  });

  it("reset zeroes everything", () => {
    const c = new OpCounter();
    c.bucket_visited();
    c.rehashed(4, 8);
    c.reset();
    expect(c.bucket_ops).toBe(0);
    expect(c.rehashes).toBe(0);
    expect(c.growth).toEqual([]);
  });
});
