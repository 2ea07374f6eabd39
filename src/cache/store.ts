import type Database from 'better-sqlite3';
import { sha256Hex } from '../shared/redact.js';

export interface CacheEntry {
  key: string;
  /** Opaque build state. */
  data: Buffer;
  contentHash: string;
  sizeBytes: number;
  createdAt: string;
  updatedAt: string;
}

export type CacheEntrySummary = Omit<CacheEntry, 'data'> & { lastUsedAt: string | null };

/**
 * Keyed build-state store shared by every job of every run.
 *
 * Exact-key lookups only. `save` overwrites (last writer wins, no locking), so
 * concurrent jobs must use disjoint keys. Entries are never removed as a side
 * effect of running a pipeline; only `prune` deletes.
 */
export interface CacheStore {
  /** Resolves null on a miss. */
  restore(key: string): Promise<CacheEntry | null>;
  save(key: string, data: Buffer): Promise<CacheEntry>;
  list(): Promise<CacheEntrySummary[]>;
  /** Delete entries not used (or written) since `cutoff`; returns how many went. */
  prune(cutoff: Date): Promise<number>;
}

interface CacheRow {
  key: string;
  data: Buffer;
  content_hash: string;
  size_bytes: number;
  created_at: string;
  updated_at: string;
  last_used_at: string | null;
}

export class SqliteCacheStore implements CacheStore {
  constructor(private readonly db: Database.Database) {}

  async restore(key: string): Promise<CacheEntry | null> {
    const row = this.db
      .prepare(`SELECT * FROM cache_entries WHERE key = ?`)
      .get(key) as CacheRow | undefined;
    if (!row) return null;

    this.db
      .prepare(`UPDATE cache_entries SET last_used_at = ? WHERE key = ?`)
      .run(new Date().toISOString(), key);

    return {
      key: row.key,
      data: row.data,
      contentHash: row.content_hash,
      sizeBytes: row.size_bytes,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  async save(key: string, data: Buffer): Promise<CacheEntry> {
    const now = new Date().toISOString();
    const contentHash = sha256Hex(data);

    this.db
      .prepare(
        `INSERT INTO cache_entries (key, data, content_hash, size_bytes, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET
           data = excluded.data,
           content_hash = excluded.content_hash,
           size_bytes = excluded.size_bytes,
           updated_at = excluded.updated_at`,
      )
      .run(key, data, contentHash, data.length, now, now);

    const row = this.db
      .prepare(`SELECT created_at FROM cache_entries WHERE key = ?`)
      .get(key) as { created_at: string } | undefined;

    return {
      key,
      data,
      contentHash,
      sizeBytes: data.length,
      createdAt: row?.created_at ?? now,
      updatedAt: now,
    };
  }

  async list(): Promise<CacheEntrySummary[]> {
    const rows = this.db
      .prepare(
        `SELECT key, content_hash, size_bytes, created_at, updated_at, last_used_at
         FROM cache_entries ORDER BY updated_at DESC`,
      )
      .all() as Omit<CacheRow, 'data'>[];

    return rows.map((row) => ({
      key: row.key,
      contentHash: row.content_hash,
      sizeBytes: row.size_bytes,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      lastUsedAt: row.last_used_at,
    }));
  }

  async prune(cutoff: Date): Promise<number> {
    const result = this.db
      .prepare(`DELETE FROM cache_entries WHERE MAX(COALESCE(last_used_at, updated_at), updated_at) < ?`)
      .run(cutoff.toISOString());
    return result.changes;
  }
}
