import { createHash } from "node:crypto";
import type { CacheEntry, CacheKey, CacheStats, CachedVector } from "./types.js";

/**
 * Durable or in-process store of corpus vectors. An entry belongs to exactly
 * one (corpus signature, model) pair and is only ever replaced whole.
 */
export interface EmbeddingCache {
  /** Returns the entry for `key` and marks it most recently used. */
  get(key: CacheKey): Promise<CacheEntry | undefined>;
  /** Replaces any entry for `key` atomically, then evicts to stay within bounds. */
  put(key: CacheKey, vectors: CachedVector[]): Promise<CacheEntry>;
  delete(key: CacheKey): Promise<boolean>;
  clear(): Promise<number>;
  stats(): Promise<CacheStats>;
  close(): void;
}

export interface CacheBounds {
  maxEntries?: number;
  maxBytes?: number;
}

export function cacheKeyId(key: CacheKey): string {
  return createHash("sha256").update(`${key.corpusSignature}\n${key.modelId}`, "utf-8").digest("hex");
}

export function estimateBytes(vectors: readonly CachedVector[]): number {
  let bytes = 0;
  for (const v of vectors) bytes += v.vector.byteLength + Buffer.byteLength(v.issueId, "utf-8");
  return bytes;
}

export function vectorChecksum(vectors: readonly CachedVector[]): string {
  const hash = createHash("sha256");
  for (const v of vectors) {
    hash.update(v.issueId, "utf-8");
    hash.update("\0");
    hash.update(Buffer.from(v.vector.buffer, v.vector.byteOffset, v.vector.byteLength));
  }
  return hash.digest("hex");
}

/** Returns the shared dimension of `vectors`, or throws when they disagree. */
export function checkDimensions(vectors: readonly CachedVector[]): number {
  if (vectors.length === 0) throw new RangeError("cannot cache an empty vector list");
  const dimensions = vectors[0].vector.length;
  if (dimensions === 0) throw new RangeError("cannot cache zero-length vectors");
  for (const v of vectors) {
    if (v.vector.length !== dimensions) {
      throw new RangeError(`vector for ${v.issueId} has ${v.vector.length} dimensions, expected ${dimensions}`);
    }
  }
  return dimensions;
}

interface MemorySlot {
  entry: CacheEntry;
  bytes: number;
}

/** In-process LRU cache; Map insertion order doubles as recency order. */
export class MemoryEmbeddingCache implements EmbeddingCache {
  private slots = new Map<string, MemorySlot>();
  private maxEntries: number;
  private maxBytes: number;

  constructor(bounds: CacheBounds = {}) {
    this.maxEntries = bounds.maxEntries ?? 16;
    this.maxBytes = bounds.maxBytes ?? Number.POSITIVE_INFINITY;
  }

  async get(key: CacheKey): Promise<CacheEntry | undefined> {
    const id = cacheKeyId(key);
    const slot = this.slots.get(id);
    if (!slot) return undefined;
    this.slots.delete(id);
    this.slots.set(id, slot);
    return slot.entry;
  }

  async put(key: CacheKey, vectors: CachedVector[]): Promise<CacheEntry> {
    const dimensions = checkDimensions(vectors);
    const entry: CacheEntry = {
      key: { ...key },
      vectors: vectors.map((v) => ({ issueId: v.issueId, vector: Float32Array.from(v.vector) })),
      dimensions,
      createdAt: new Date().toISOString(),
    };
    const id = cacheKeyId(key);
    this.slots.delete(id);
    this.slots.set(id, { entry, bytes: estimateBytes(entry.vectors) });
    this.evict(id);
    return entry;
  }

  async delete(key: CacheKey): Promise<boolean> {
    return this.slots.delete(cacheKeyId(key));
  }

  async clear(): Promise<number> {
    const n = this.slots.size;
    this.slots.clear();
    return n;
  }

  async stats(): Promise<CacheStats> {
    let totalBytesEstimate = 0;
    for (const slot of this.slots.values()) totalBytesEstimate += slot.bytes;
    return {
      entryCount: this.slots.size,
      totalBytesEstimate,
      keys: [...this.slots.values()].reverse().map((s) => ({ ...s.entry.key })),
    };
  }

  close(): void {
    this.slots.clear();
  }

  private evict(keep: string): void {
    let bytes = 0;
    for (const slot of this.slots.values()) bytes += slot.bytes;
    for (const [id, slot] of this.slots) {
      if (this.slots.size <= this.maxEntries && bytes <= this.maxBytes) break;
      if (id === keep) continue;
      this.slots.delete(id);
      bytes -= slot.bytes;
    }
  }
}
