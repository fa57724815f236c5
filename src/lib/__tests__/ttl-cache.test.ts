import { describe, it, expect, vi } from "vitest";
import { TtlCache } from "../ttl-cache.ts";

function makeClock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("TtlCache", () => {
  it("serves a value until its TTL elapses", () => {
    const clock = makeClock();
    const cache = new TtlCache<number>(100, clock.now);

    cache.set("alpha", 0.82);
    clock.advance(99);
    expect(cache.get("alpha")).toBe(0.82);

    clock.advance(1);
    expect(cache.get("alpha")).toBeUndefined();
  });

  it("computes once and reuses the stored value", async () => {
    const cache = new TtlCache<string>(1_000, makeClock().now);
    const compute = vi.fn(async () => "fresh");

    expect(await cache.getOrCompute("k", compute)).toBe("fresh");
    expect(await cache.getOrCompute("k", compute)).toBe("fresh");
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("stores nothing when the computation rejects", async () => {
    const cache = new TtlCache<string>(1_000, makeClock().now);

    await expect(
      cache.getOrCompute("k", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(cache.get("k")).toBeUndefined();
  });

  it("drops every entry on invalidate", () => {
    const cache = new TtlCache<number>(1_000, makeClock().now);
    cache.set("a", 1);
    cache.set("b", 2);

    cache.invalidate();
    expect(cache.get("a")).toBeUndefined();
    expect(cache.get("b")).toBeUndefined();
  });
});
