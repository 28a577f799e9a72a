import { describe, expect, it } from "vitest";
import { buildCacheKey, TTLCache } from "../src/services/cache";

function clockAt(start: number) {
  const clock = { now: start, read: () => clock.now };
  return clock;
}

describe("TTLCache", () => {
  it("serves entries until they expire", async () => {
    const clock = clockAt(1000);
    const cache = new TTLCache<string>("test", 100, 10, clock.read);
    await cache.set("k", "v");

    clock.now = 1099;
    expect(await cache.get("k")).toEqual({ hit: true, value: "v", ageMs: 99 });

    clock.now = 1100;
    expect(await cache.get("k")).toEqual({ hit: false });
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, evictions: 0, size: 0 });
  });

  it("expires each entry after its own TTL", async () => {
    const clock = clockAt(1000);
    const cache = new TTLCache<string>("test", 100, 10, clock.read);
    await cache.set("short", "a", { ttlMs: 10 });
    await cache.set("long", "b", { ttlMs: 500 });
    await cache.set("default", "c");

    clock.now = 1010;
    expect(await cache.get("short")).toEqual({ hit: false });
    expect(await cache.get("default")).toEqual({ hit: true, value: "c", ageMs: 10 });

    clock.now = 1100;
    expect(await cache.get("default")).toEqual({ hit: false });
    expect(await cache.get("long")).toEqual({ hit: true, value: "b", ageMs: 100 });

    clock.now = 1500;
    expect(await cache.get("long")).toEqual({ hit: false });
    await expect(cache.set("never", "d", { ttlMs: 0 })).rejects.toThrow(RangeError);
  });

  it("resets and reports a miss when its bookkeeping disagrees", async () => {
    const cache = new TTLCache<number>("test", 1000, 10);
    await cache.set("a", 1);
    await cache.set("b", 2);
    cache["lru"].delete("a");

    expect(await cache.get("b")).toEqual({ hit: false });
    expect(cache.stats()).toMatchObject({ size: 0, misses: 1, hits: 0 });
    expect(cache.keys()).toEqual([]);

    await cache.set("b", 3);
    expect(await cache.get("b")).toEqual({ hit: true, value: 3, ageMs: expect.any(Number) });
  });

  it("evicts the least recently used entry at capacity", async () => {
    const cache = new TTLCache<number>("test", 1000, 2);
    await cache.set("a", 1);
    await cache.set("b", 2);
    await cache.get("a");
    await cache.set("c", 3);

    expect(cache.keys()).toEqual(["a", "c"]);
    expect(await cache.get("b")).toEqual({ hit: false });
    expect(cache.stats().evictions).toBe(1);
  });

  it("overwrites an existing key without evicting", async () => {
    const cache = new TTLCache<number>("test", 1000, 2);
    await cache.set("a", 1);
    await cache.set("b", 2);
    await cache.set("a", 3);

    expect(cache.keys()).toEqual(["b", "a"]);
    expect(cache.stats()).toMatchObject({ evictions: 0, size: 2 });
  });

  it("skips writes for an aborted request", async () => {
    const cache = new TTLCache<string>("test", 1000, 2);
    const controller = new AbortController();
    controller.abort();

    expect(await cache.set("k", "v", { signal: controller.signal })).toBe(false);
    expect(await cache.get("k")).toEqual({ hit: false });
  });

  it("clears every entry", async () => {
    const cache = new TTLCache<string>("test", 1000, 2);
    await cache.set("k", "v");
    await cache.clear();
    expect(cache.stats().size).toBe(0);
    expect(cache.keys()).toEqual([]);
  });

  it("keeps concurrent writers consistent", async () => {
    const cache = new TTLCache<number>("test", 1000, 5);
    await Promise.all(Array.from({ length: 20 }, (_, i) => cache.set(`k${i}`, i)));
    expect(cache.keys()).toEqual(["k15", "k16", "k17", "k18", "k19"]);
    expect(cache.stats()).toMatchObject({ size: 5, evictions: 15 });
  });

  it("refuses a non-positive TTL or capacity", () => {
    expect(() => new TTLCache("test", 0, 10)).toThrow(RangeError);
    expect(() => new TTLCache("test", 10, 0)).toThrow(RangeError);
  });
});

describe("buildCacheKey", () => {
  const base = { connectionId: "conn-1", query: "How many employees?", page: 1, pageSize: 50 };

  it("ignores case and spacing in the question", () => {
    expect(buildCacheKey({ ...base, query: "  how many   EMPLOYEES? " })).toBe(buildCacheKey(base));
  });

  it("separates connections and pages", () => {
    expect(buildCacheKey({ ...base, connectionId: "conn-2" })).not.toBe(buildCacheKey(base));
    expect(buildCacheKey({ ...base, page: 2 })).not.toBe(buildCacheKey(base));
    expect(buildCacheKey({ ...base, pageSize: 10 })).not.toBe(buildCacheKey(base));
  });
});
