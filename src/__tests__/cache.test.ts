import { describe, expect, it } from "vitest";
import { MemoryEmbeddingCache, cacheKeyId, checkDimensions, estimateBytes, vectorChecksum } from "../cache.js";
import type { CachedVector } from "../types.js";

function vectors(...ids: string[]): CachedVector[] {
  return ids.map((issueId, i) => ({ issueId, vector: Float32Array.from([i + 1, 0]) }));
}

const key = (corpusSignature: string, modelId = "m1") => ({ corpusSignature, modelId });

describe("cache keys", () => {
  it("distinguish signature and model", () => {
    expect(cacheKeyId(key("s1"))).toBe(cacheKeyId(key("s1")));
    expect(cacheKeyId(key("s1"))).not.toBe(cacheKeyId(key("s1", "m2")));
    expect(cacheKeyId(key("s1"))).not.toBe(cacheKeyId(key("s2")));
  });
});

describe("vector helpers", () => {
  it("estimates bytes from vector storage and ids", () => {
    // two float32 (8 bytes) + 2-byte id, twice
    expect(estimateBytes(vectors("A1", "B2"))).toBe(20);
  });

  it("checksums order and content", () => {
    const a = vectors("A1", "B2");
    expect(vectorChecksum(a)).toBe(vectorChecksum(vectors("A1", "B2")));
    expect(vectorChecksum(a)).not.toBe(vectorChecksum(vectors("B2", "A1")));
  });

  it("rejects empty and ragged vector lists", () => {
    expect(() => checkDimensions([])).toThrow(RangeError);
    expect(() => checkDimensions([{ issueId: "A1", vector: new Float32Array(0) }])).toThrow(RangeError);
    const ragged = [
      { issueId: "A1", vector: Float32Array.from([1, 2]) },
      { issueId: "B2", vector: Float32Array.from([1, 2, 3]) },
    ];
    expect(() => checkDimensions(ragged)).toThrow("vector for B2 has 3 dimensions, expected 2");
  });
});

describe("MemoryEmbeddingCache", () => {
  it("stores and returns entries by key", async () => {
    const cache = new MemoryEmbeddingCache();
    const put = await cache.put(key("s1"), vectors("A1", "B2"));
    expect(put.dimensions).toBe(2);

    const entry = await cache.get(key("s1"));
    expect(entry?.vectors.map((v) => v.issueId)).toEqual(["A1", "B2"]);
    expect(entry?.key).toEqual(key("s1"));
    expect(await cache.get(key("s1", "m2"))).toBeUndefined();
  });

  it("copies vectors on write", async () => {
    const cache = new MemoryEmbeddingCache();
    const input = vectors("A1");
    await cache.put(key("s1"), input);
    input[0].vector[0] = 99;
    const entry = await cache.get(key("s1"));
    expect(entry?.vectors[0].vector[0]).toBe(1);
  });

  it("replaces an entry whole", async () => {
    const cache = new MemoryEmbeddingCache();
    await cache.put(key("s1"), vectors("A1", "B2"));
    await cache.put(key("s1"), vectors("C3"));
    const entry = await cache.get(key("s1"));
    expect(entry?.vectors.map((v) => v.issueId)).toEqual(["C3"]);
    expect((await cache.stats()).entryCount).toBe(1);
  });

  it("evicts the least recently used entry beyond maxEntries", async () => {
    const cache = new MemoryEmbeddingCache({ maxEntries: 2 });
    await cache.put(key("s1"), vectors("A1"));
    await cache.put(key("s2"), vectors("A1"));
    await cache.get(key("s1"));
    await cache.put(key("s3"), vectors("A1"));

    expect(await cache.get(key("s2"))).toBeUndefined();
    expect(await cache.get(key("s1"))).toBeDefined();
    expect(await cache.get(key("s3"))).toBeDefined();
  });

  it("evicts by byte budget but keeps the entry just written", async () => {
    const cache = new MemoryEmbeddingCache({ maxBytes: 15 });
    await cache.put(key("s1"), vectors("A1"));
    await cache.put(key("s2"), vectors("A1", "B2"));

    const stats = await cache.stats();
    expect(stats.keys).toEqual([key("s2")]);
    expect(stats.totalBytesEstimate).toBe(20);
  });

  it("lists keys most recently used first", async () => {
    const cache = new MemoryEmbeddingCache();
    await cache.put(key("s1"), vectors("A1"));
    await cache.put(key("s2"), vectors("A1"));
    await cache.get(key("s1"));
    expect((await cache.stats()).keys).toEqual([key("s1"), key("s2")]);
  });

  it("deletes and clears", async () => {
    const cache = new MemoryEmbeddingCache();
    await cache.put(key("s1"), vectors("A1"));
    await cache.put(key("s2"), vectors("A1"));
    expect(await cache.delete(key("s1"))).toBe(true);
    expect(await cache.delete(key("s1"))).toBe(false);
    expect(await cache.clear()).toBe(1);
    expect((await cache.stats()).entryCount).toBe(0);
  });
});
