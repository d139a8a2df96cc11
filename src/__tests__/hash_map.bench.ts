import { bench, describe } from "vitest";
import { GrowableHashMap } from "../map/growable_hash_map";
import { TrackedHashMap } from "../map/tracked_hash_map";

const TIERS = [1_000, 5_000, 20_000] as const;

// ============================================================
// Sequential insertion — summed size vs tracked count
// ============================================================

describe("sequential insertion", () => {
  for (const N of TIERS) {
    bench(`growable (summed size) ${N.toLocaleString()} keys`, () => {
      const map = new GrowableHashMap<number, number>();
      for (let i = 0; i < N; i++) map.put(i, i);
    });

    bench(`tracked (carry) ${N.toLocaleString()} keys`, () => {
      const map = new TrackedHashMap<number, number>();
      for (let i = 0; i < N; i++) map.put(i, i);
    });

    bench(`tracked (recount) ${N.toLocaleString()} keys`, () => {
      const map = new TrackedHashMap<number, number>({
        rehash_policy: "recount",
      });
      for (let i = 0; i < N; i++) map.put(i, i);
    });
  }
});

// ============================================================
// Lookup on a populated map
// ============================================================

describe("lookup", () => {
  for (const N of TIERS) {
    let map: TrackedHashMap<number, number>;

    bench(
      `get ${N.toLocaleString()} present keys`,
      () => {
        for (let i = 0; i < N; i++) map.get(i);
      },
      {
        setup: () => {
          map = new TrackedHashMap<number, number>();
          for (let i = 0; i < N; i++) map.put(i, i);
        },
      },
    );
  }
});
