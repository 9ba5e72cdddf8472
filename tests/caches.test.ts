import { describe, expect, it, vi } from "vitest";
import { EmbeddingCache } from "../src/infra/cache/embeddingCache.js";
import { ResultCache } from "../src/infra/cache/resultCache.js";

describe("EmbeddingCache", () => {
  it("evicts the least recently used entry", () => {
    const cache = new EmbeddingCache({ enabled: true, capacity: 2 });
    cache.set("a", [1]);
    cache.set("b", [2]);
    expect(cache.get("a")).toEqual([1]);

    cache.set("c", [3]);

    expect(cache.get("b")).toBeNull();
    expect(cache.get("a")).toEqual([1]);
    expect(cache.get("c")).toEqual([3]);
    expect(cache.size).toBe(2);
  });

  it("computes a miss once and serves the hit afterwards", async () => {
    const cache = new EmbeddingCache({ enabled: true, capacity: 10 });
    const compute = vi.fn(async () => [0.1, 0.2]);

    await cache.getOrCompute("question", compute);
    const second = await cache.getOrCompute("question", compute);

    expect(second).toEqual([0.1, 0.2]);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("stores nothing when disabled", async () => {
    const cache = new EmbeddingCache({ enabled: false, capacity: 10 });
    const compute = vi.fn(async () => [1]);
    await cache.getOrCompute("q", compute);
    await cache.getOrCompute("q", compute);
    expect(compute).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(0);
  });
});

describe("ResultCache", () => {
  const keyInput = { question: "what is the refund policy?", dataSourceId: "ds-1", topK: 5 };

  it("serves a stored value until the data source version changes", () => {
    const cache = new ResultCache<string>({ enabled: true, capacity: 10, ttlSeconds: 60 });
    cache.set(cache.buildKey(keyInput), "answer v0");

    expect(cache.get(cache.buildKey(keyInput))).toBe("answer v0");

    expect(cache.bumpVersion("ds-1")).toBe(1);
    expect(cache.get(cache.buildKey(keyInput))).toBeNull();
  });

  it("keys on question, scope and topK", () => {
    const cache = new ResultCache<string>({ enabled: true, capacity: 10, ttlSeconds: 60 });
    const base = cache.buildKey(keyInput);
    expect(cache.buildKey({ ...keyInput, topK: 3 })).not.toBe(base);
    expect(cache.buildKey({ ...keyInput, dataSourceId: null })).not.toBe(base);
    expect(cache.buildKey({ ...keyInput })).toBe(base);
  });

  it("orphans a value stored under a key built before a bump", () => {
    const cache = new ResultCache<string>({ enabled: true, capacity: 10, ttlSeconds: 60 });
    const key = cache.buildKey(keyInput);
    cache.bumpVersion("ds-1");
    cache.set(key, "stale");
    expect(cache.get(cache.buildKey(keyInput))).toBeNull();
  });

  it("expires entries after the TTL", () => {
    let now = 1_000;
    const cache = new ResultCache<string>({ enabled: true, capacity: 10, ttlSeconds: 5, now: () => now });
    const key = cache.buildKey(keyInput);
    cache.set(key, "answer");

    now += 4_999;
    expect(cache.get(key)).toBe("answer");
    now += 1;
    expect(cache.get(key)).toBeNull();
    expect(cache.size).toBe(0);
  });

  it("evicts the oldest entry at capacity", () => {
    const cache = new ResultCache<string>({ enabled: true, capacity: 2, ttlSeconds: 60 });
    const keys = ["q1", "q2", "q3"].map((question) => cache.buildKey({ ...keyInput, question }));
    keys.forEach((key, index) => cache.set(key, `a${index + 1}`));

    expect(cache.get(keys[0])).toBeNull();
    expect(cache.get(keys[1])).toBe("a2");
    expect(cache.get(keys[2])).toBe("a3");
  });

  it("reports version 0 for unscoped questions", () => {
    const cache = new ResultCache<string>({ enabled: true, capacity: 2, ttlSeconds: 60 });
    expect(cache.getVersion(null)).toBe(0);
  });
});
