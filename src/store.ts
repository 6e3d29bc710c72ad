import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import {
  type CacheBounds,
  type EmbeddingCache,
  cacheKeyId,
  checkDimensions,
  estimateBytes,
  vectorChecksum,
} from "./cache.js";
import { CacheIOError, errorMessage } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import type { CacheEntry, CacheKey, CacheStats, CachedVector } from "./types.js";

const STORE_SCHEMA_VERSION = "1";

export interface SqliteCacheOptions extends CacheBounds {
  /** Milliseconds to wait on a locked database before failing. */
  busyTimeoutMs?: number;
  logger?: Logger;
}

interface EntryRow {
  key_id: string;
  corpus_signature: string;
  model_id: string;
  created_at: string;
  last_used: number;
  row_count: number;
  dimensions: number;
  byte_size: number;
  checksum: string;
}

interface VectorRow {
  position: number;
  issue_id: string;
  embedding: Buffer;
}

function toBlob(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

// copy out of the row buffer: SQLite blobs are not guaranteed 4-byte aligned
function fromBlob(blob: Buffer): Float32Array {
  return new Float32Array(blob.buffer.slice(blob.byteOffset, blob.byteOffset + blob.byteLength));
}

/**
 * Embedding cache persisted in SQLite. One `cache_entries` row per
 * (signature, model) key plus its ordered vectors; every write is a single
 * transaction, and reads verify the stored checksum before trusting a row set.
 */
export class SqliteEmbeddingCache implements EmbeddingCache {
  private db: Database.Database;
  private maxEntries: number;
  private maxBytes: number;
  private logger: Logger;
  readonly path: string;

  constructor(dbPath?: string, options: SqliteCacheOptions = {}) {
    const p = dbPath || resolve(process.cwd(), "data", "sieve.db");
    this.path = p;
    this.maxEntries = options.maxEntries ?? 16;
    this.maxBytes = options.maxBytes ?? 256 * 1024 * 1024;
    this.logger = options.logger ?? silentLogger;
    try {
      mkdirSync(dirname(p), { recursive: true });
      this.db = new Database(p, { timeout: options.busyTimeoutMs ?? 5000 });
      this.init();
    } catch (err) {
      throw new CacheIOError("open", `could not open embedding cache at ${p}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private init() {
    this.db.pragma("journal_mode = WAL");

    // metadata table must exist before the version check
    this.db.exec("CREATE TABLE IF NOT EXISTS sieve_meta (key TEXT PRIMARY KEY, value TEXT NOT NULL)");

    const storedVersion = this.getMeta("schema_version");
    if (storedVersion && storedVersion !== STORE_SCHEMA_VERSION) {
      this.logger.warn({ storedVersion, expected: STORE_SCHEMA_VERSION }, "cache schema changed, discarding entries");
      this.db.exec("DROP TABLE IF EXISTS cache_vectors; DROP TABLE IF EXISTS cache_entries;");
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cache_entries (
        key_id TEXT PRIMARY KEY,
        corpus_signature TEXT NOT NULL,
        model_id TEXT NOT NULL,
        created_at TEXT NOT NULL,
        last_used INTEGER NOT NULL,
        row_count INTEGER NOT NULL,
        dimensions INTEGER NOT NULL,
        byte_size INTEGER NOT NULL,
        checksum TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS cache_vectors (
        key_id TEXT NOT NULL,
        position INTEGER NOT NULL,
        issue_id TEXT NOT NULL,
        embedding BLOB NOT NULL,
        PRIMARY KEY (key_id, position)
      );

      CREATE INDEX IF NOT EXISTS idx_entries_last_used ON cache_entries(last_used);
    `);
    this.setMeta("schema_version", STORE_SCHEMA_VERSION);
  }

  getMeta(key: string): string | undefined {
    const row = this.db.prepare<[string], { value: string }>("SELECT value FROM sieve_meta WHERE key = ?").get(key);
    return row?.value;
  }

  setMeta(key: string, value: string): void {
    this.db
      .prepare(
        "INSERT INTO sieve_meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value",
      )
      .run(key, value);
  }

  async get(key: CacheKey): Promise<CacheEntry | undefined> {
    const id = cacheKeyId(key);
    try {
      return this.read(id, key);
    } catch (err) {
      throw new CacheIOError("read", `embedding cache read failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private read(id: string, key: CacheKey): CacheEntry | undefined {
    const row = this.db
      .prepare<[string], EntryRow>("SELECT * FROM cache_entries WHERE key_id = ?")
      .get(id);
    if (!row) return undefined;
    if (row.corpus_signature !== key.corpusSignature || row.model_id !== key.modelId) {
      this.discard(id, "key fields do not match");
      return undefined;
    }

    const rows = this.db
      .prepare<[string], VectorRow>(
        "SELECT position, issue_id, embedding FROM cache_vectors WHERE key_id = ? ORDER BY position",
      )
      .all(id);
    if (rows.length !== row.row_count) {
      this.discard(id, `expected ${row.row_count} vectors, found ${rows.length}`);
      return undefined;
    }
    const vectors: CachedVector[] = [];
    for (let i = 0; i < rows.length; i++) {
      const r = rows[i];
      if (r.position !== i || r.embedding.byteLength !== row.dimensions * 4) {
        this.discard(id, `vector ${i} is malformed`);
        return undefined;
      }
      vectors.push({ issueId: r.issue_id, vector: fromBlob(r.embedding) });
    }
    if (vectorChecksum(vectors) !== row.checksum) {
      this.discard(id, "checksum mismatch");
      return undefined;
    }

    this.db.prepare("UPDATE cache_entries SET last_used = ? WHERE key_id = ?").run(this.nextSequence(), id);
    return {
      key: { corpusSignature: row.corpus_signature, modelId: row.model_id },
      vectors,
      dimensions: row.dimensions,
      createdAt: row.created_at,
    };
  }

  private discard(id: string, reason: string): void {
    this.logger.warn({ keyId: id, reason }, "discarding corrupt cache entry");
    this.remove(id);
  }

  private remove(id: string): boolean {
    const tx = this.db.transaction((keyId: string) => {
      this.db.prepare("DELETE FROM cache_vectors WHERE key_id = ?").run(keyId);
      return this.db.prepare("DELETE FROM cache_entries WHERE key_id = ?").run(keyId).changes > 0;
    });
    return tx(id);
  }

  private nextSequence(): number {
    const row = this.db
      .prepare<[], { next: number }>("SELECT COALESCE(MAX(last_used), 0) + 1 AS next FROM cache_entries")
      .get();
    return row?.next ?? 1;
  }

  async put(key: CacheKey, vectors: CachedVector[]): Promise<CacheEntry> {
    const dimensions = checkDimensions(vectors);
    const id = cacheKeyId(key);
    const entry: CacheEntry = {
      key: { ...key },
      vectors: vectors.map((v) => ({ issueId: v.issueId, vector: Float32Array.from(v.vector) })),
      dimensions,
      createdAt: new Date().toISOString(),
    };

    const write = this.db.transaction(() => {
      this.db.prepare("DELETE FROM cache_vectors WHERE key_id = ?").run(id);
      this.db.prepare("DELETE FROM cache_entries WHERE key_id = ?").run(id);
      this.db
        .prepare(`
        INSERT INTO cache_entries
          (key_id, corpus_signature, model_id, created_at, last_used, row_count, dimensions, byte_size, checksum)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
        .run(
          id,
          key.corpusSignature,
          key.modelId,
          entry.createdAt,
          this.nextSequence(),
          entry.vectors.length,
          dimensions,
          estimateBytes(entry.vectors),
          vectorChecksum(entry.vectors),
        );
      const insert = this.db.prepare(
        "INSERT INTO cache_vectors (key_id, position, issue_id, embedding) VALUES (?, ?, ?, ?)",
      );
      entry.vectors.forEach((v, position) => {
        insert.run(id, position, v.issueId, toBlob(v.vector));
      });
      return this.evict(id);
    });

    try {
      const evicted = write();
      if (evicted > 0) this.logger.debug({ evicted }, "evicted least recently used cache entries");
    } catch (err) {
      throw new CacheIOError("write", `embedding cache write failed: ${errorMessage(err)}`, { cause: err });
    }
    return entry;
  }

  // oldest last_used first; the entry being written is never evicted
  private evict(keep?: string): number {
    const rows = this.db
      .prepare<[], Pick<EntryRow, "key_id" | "byte_size">>(
        "SELECT key_id, byte_size FROM cache_entries ORDER BY last_used ASC",
      )
      .all();
    let count = rows.length;
    let bytes = rows.reduce((sum, r) => sum + r.byte_size, 0);
    let evicted = 0;
    for (const r of rows) {
      if (count <= this.maxEntries && bytes <= this.maxBytes) break;
      if (r.key_id === keep) continue;
      this.db.prepare("DELETE FROM cache_vectors WHERE key_id = ?").run(r.key_id);
      this.db.prepare("DELETE FROM cache_entries WHERE key_id = ?").run(r.key_id);
      count--;
      bytes -= r.byte_size;
      evicted++;
    }
    return evicted;
  }

  /** Applies the size bounds without writing; returns the number of entries removed. */
  prune(): number {
    try {
      return this.db.transaction(() => this.evict())();
    } catch (err) {
      throw new CacheIOError("write", `embedding cache prune failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async delete(key: CacheKey): Promise<boolean> {
    try {
      return this.remove(cacheKeyId(key));
    } catch (err) {
      throw new CacheIOError("write", `embedding cache delete failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async clear(): Promise<number> {
    try {
      return this.db.transaction(() => {
        this.db.prepare("DELETE FROM cache_vectors").run();
        return this.db.prepare("DELETE FROM cache_entries").run().changes;
      })();
    } catch (err) {
      throw new CacheIOError("write", `embedding cache clear failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async stats(): Promise<CacheStats> {
    try {
      const rows = this.db
        .prepare<[], Pick<EntryRow, "corpus_signature" | "model_id" | "byte_size">>(
          "SELECT corpus_signature, model_id, byte_size FROM cache_entries ORDER BY last_used DESC",
        )
        .all();
      return {
        entryCount: rows.length,
        totalBytesEstimate: rows.reduce((sum, r) => sum + r.byte_size, 0),
        keys: rows.map((r) => ({ corpusSignature: r.corpus_signature, modelId: r.model_id })),
      };
    } catch (err) {
      throw new CacheIOError("read", `embedding cache stats failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  close(): void {
    this.db.close();
  }
}
