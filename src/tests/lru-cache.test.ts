import { describe, expect, it } from "vitest";
import { LruCache } from "../lru-cache";

describe("LruCache", () => {
  it("evicts the least recently used entry", () => {
    const cache = new LruCache<number>(2);
    cache.set("a", 1);
    cache.set("b", 2);
    expect(cache.get("a")).toBe(1);
    cache.set("c", 3);
    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toBe(1);
    expect(cache.get("c")).toBe(3);
  });

  it("expires entries older than the ttl", () => {
    let now = 0;
    const cache = new LruCache<string>(10, 100, () => now);
    cache.set("k", "v");
    now = 100;
    expect(cache.get("k")).toBe("v");
    now = 101;
    expect(cache.get("k")).toBeUndefined();
  });

  it("overwrites an entry without evicting another", () => {
    const cache = new LruCache<number>(2);
    cache.set("a", 1);
    cache.set("b", 2);
    cache.set("a", 3);
    expect(cache.get("a")).toBe(3);
    expect(cache.get("b")).toBe(2);
  });
});
