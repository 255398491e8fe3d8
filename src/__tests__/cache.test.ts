import { describe, expect, it } from "vitest";
import { Cache } from "../runtime/cache";
import { seedFromString } from "../runtime/generate";
import { basicShape, Transforms, transformShape } from "../runtime/shape";
import { float, int, list, shape, type Value } from "../runtime/value";
import { isScriptError } from "../runtime/errors";

const SEED = seedFromString("test-seed");

describe("Cache.fingerprint", () => {
  it("is stable for equal inputs", () => {
    const a = Cache.fingerprint("grow", 0, [int(1), list([int(2)])], { name: "root", branch: 0 });
    const b = Cache.fingerprint("grow", 0, [int(1), list([int(2)])], { name: "root", branch: 0 });
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{16}$/);
  });

  it("separates names, branches, argument types and scopes", () => {
    const base = Cache.fingerprint("grow", 0, [int(1)], null);
    expect(Cache.fingerprint("grew", 0, [int(1)], null)).not.toBe(base);
    expect(Cache.fingerprint("grow", 1, [int(1)], null)).not.toBe(base);
    expect(Cache.fingerprint("grow", 0, [float(1)], null)).not.toBe(base);
    expect(Cache.fingerprint("grow", 0, [int(1)], { name: "root", branch: 0 })).not.toBe(base);
  });

  it("keeps signed zeros and infinities apart", () => {
    const key = (n: number) => Cache.fingerprint("f", 0, [float(n)], null);
    expect(key(-0)).not.toBe(key(0));
    expect(key(-Infinity)).not.toBe(key(Infinity));
    expect(key(Number.NaN)).not.toBe(key(Infinity));
    expect(key(-0)).toBe(key(-0));
  });

  it("depends on shape structure, not on object identity", () => {
    const build = (dx: number) =>
      shape(transformShape(transformShape(basicShape("SQUARE"), Transforms.scale(2, 2)), Transforms.translate(dx, 0)));
    const first = Cache.fingerprint("grow", 0, [build(1)], null);
    expect(Cache.fingerprint("grow", 0, [build(1)], null)).toBe(first);
    expect(Cache.fingerprint("grow", 0, [build(1.5)], null)).not.toBe(first);
  });
});

describe("Cache", () => {
  it("counts hits and misses", () => {
    const cache = Cache.create(SEED);
    expect(cache.get("k")).toBeUndefined();
    cache.set("k", int(7));
    expect(cache.has("k")).toBe(true);
    expect(cache.get("k")).toEqual(int(7));
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, entries: 1, draws: 0 });
  });

  it("runs a memoized computation once for concurrent callers", async () => {
    const cache = Cache.create(SEED);
    let runs = 0;
    const compute = async (): Promise<Value> => {
      runs++;
      await Promise.resolve();
      return int(runs);
    };
    const results = await Promise.all([
      cache.memo("k", null, compute),
      cache.memo("k", null, compute),
      cache.memo("k", null, compute),
    ]);
    expect(results).toEqual([int(1), int(1), int(1)]);
    expect(runs).toBe(1);
    expect(await cache.memo("k", null, compute)).toEqual(int(1));
    expect(cache.stats()).toEqual({ hits: 3, misses: 1, entries: 1, draws: 0 });
  });

  it("reduces again instead of waiting on itself", async () => {
    const cache = Cache.create(SEED);
    let depth = 0;
    const compute = async (): Promise<Value> => {
      depth++;
      await Promise.resolve();
      if (depth < 3) return cache.memo("k", "k", compute);
      return int(depth);
    };
    expect(await cache.memo("k", null, compute)).toEqual(int(3));
  });

  it("draws the same sequence from the same seed", () => {
    const first = Cache.create(SEED);
    const second = Cache.create(SEED);
    const draw = (cache: Cache) => Array.from({ length: 5 }, () => cache.draw((rng) => rng.next()));
    expect(draw(first)).toEqual(draw(second));
    expect(first.stats().draws).toBe(5);
  });

  it("requires a 32-byte seed", () => {
    let error: unknown;
    try {
      Cache.create(new Uint8Array(8));
    } catch (e: unknown) {
      error = e;
    }
    expect(isScriptError(error, "MissingSeed")).toBe(true);
  });
});
