/**
 * Evidence Cache
 *
 * SQLite-based cache for raw claims pages fetched from patent backends.
 * Avoids repeat network requests across runs; entries expire after a TTL.
 *
 * Cache Key: sha256(documentId | backend | url)
 *
 * A row whose stored content no longer matches its content hash is treated
 * as a miss and removed. Read/write errors never propagate: the fetch path
 * falls back to the network.
 *
 * @module evidence-cache
 */

import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import * as fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import type { CacheConfig } from "./config-schemas";
import type { ClaimsBackend } from "./types";

// ============================================================================
// TYPES
// ============================================================================

/**
 * Contract the fetch orchestrator depends on.
 */
export interface ClaimsContentCache {
  get(documentId: string, backend: ClaimsBackend, url: string): Promise<string | null>;
  put(documentId: string, backend: ClaimsBackend, url: string, content: string): Promise<void>;
}

interface EvidenceCacheRow {
  cache_key: string;
  document_id: string;
  backend: string;
  url: string;
  content: string;
  content_sha256: string;
  cached_at: string;
  expires_at: string;
}

export interface EvidenceCacheStats {
  totalEntries: number;
  validEntries: number;
  expiredEntries: number;
  documents: number;
  backendBreakdown: Record<string, number>;
  oldestEntry: string | null;
  newestEntry: string | null;
  dbSizeBytes: number | null;
}

// ============================================================================
// CACHE KEY GENERATION
// ============================================================================

/**
 * Deterministic cache key for one (document, backend, request) triple.
 */
export function generateCacheKey(documentId: string, backend: ClaimsBackend, url: string): string {
  const parts = [documentId.trim().toUpperCase(), backend, url.trim()];
  return crypto.createHash("sha256").update(parts.join("|")).digest("hex");
}

function hashContent(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

// ============================================================================
// SQLITE CACHE
// ============================================================================

export class EvidenceCache implements ClaimsContentCache {
  private db: Database | null = null;
  private dbPromise: Promise<Database> | null = null;

  constructor(private readonly config: CacheConfig) {}

  get dbPath(): string {
    return path.resolve(this.config.dbPath);
  }

  private async getDb(): Promise<Database> {
    if (this.db) return this.db;
    if (!this.dbPromise) {
      this.dbPromise = (async () => {
        const dbPath = this.dbPath;
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
        console.log(`[Evidence-Cache] Opening database at ${dbPath}`);

        const instance = await open({
          filename: dbPath,
          driver: sqlite3.Database,
        });

        await instance.exec("PRAGMA journal_mode=WAL");
        await instance.exec(`
          CREATE TABLE IF NOT EXISTS evidence_cache (
            cache_key TEXT PRIMARY KEY,
            document_id TEXT NOT NULL,
            backend TEXT NOT NULL,
            url TEXT NOT NULL,
            content TEXT NOT NULL,
            content_sha256 TEXT NOT NULL,
            cached_at TEXT NOT NULL,
            expires_at TEXT NOT NULL
          );

          CREATE INDEX IF NOT EXISTS idx_evidence_cache_expires ON evidence_cache(expires_at);
          CREATE INDEX IF NOT EXISTS idx_evidence_cache_document ON evidence_cache(document_id);
        `);

        this.db = instance;
        return instance;
      })();
    }
    return this.dbPromise;
  }

  /**
   * Cached content if present, unexpired and intact; otherwise null.
   */
  async get(documentId: string, backend: ClaimsBackend, url: string): Promise<string | null> {
    if (!this.config.enabled) return null;

    const cacheKey = generateCacheKey(documentId, backend, url);
    try {
      const database = await this.getDb();
      const row = await database.get<EvidenceCacheRow>(
        `SELECT * FROM evidence_cache WHERE cache_key = ? AND expires_at > ?`,
        [cacheKey, new Date().toISOString()],
      );
      if (!row) return null;

      if (typeof row.content !== "string" || hashContent(row.content) !== row.content_sha256) {
        console.warn(`[Evidence-Cache] Corrupted entry for ${documentId} (${backend}), discarding`);
        await database.run("DELETE FROM evidence_cache WHERE cache_key = ?", [cacheKey]);
        return null;
      }

      console.log(`[Evidence-Cache] HIT ${documentId} (${backend}) ${url}`);
      return row.content;
    } catch (err) {
      console.error("[Evidence-Cache] Error reading cache:", err);
      return null;
    }
  }

  /**
   * Store fetched content. Same key overwrites (last successful fetch wins).
   */
  async put(documentId: string, backend: ClaimsBackend, url: string, content: string): Promise<void> {
    if (!this.config.enabled) return;

    try {
      const database = await this.getDb();
      const now = new Date();
      const expiresAt = new Date(now.getTime() + this.config.ttlDays * 24 * 60 * 60 * 1000);

      await database.run(
        `INSERT OR REPLACE INTO evidence_cache
         (cache_key, document_id, backend, url, content, content_sha256, cached_at, expires_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          generateCacheKey(documentId, backend, url),
          documentId.trim().toUpperCase(),
          backend,
          url,
          content,
          hashContent(content),
          now.toISOString(),
          expiresAt.toISOString(),
        ],
      );
    } catch (err) {
      console.error("[Evidence-Cache] Error writing cache:", err);
    }
  }

  // ==========================================================================
  // MAINTENANCE
  // ==========================================================================

  /**
   * Delete expired entries. Returns number of rows removed.
   */
  async cleanupExpired(): Promise<number> {
    try {
      const database = await this.getDb();
      const result = await database.run("DELETE FROM evidence_cache WHERE expires_at <= ?", [
        new Date().toISOString(),
      ]);
      const deleted = result.changes ?? 0;
      if (deleted > 0) {
        console.log(`[Evidence-Cache] Cleaned up ${deleted} expired entries`);
      }
      return deleted;
    } catch (err) {
      console.error("[Evidence-Cache] Error cleaning up cache:", err);
      return 0;
    }
  }

  async clearAll(): Promise<number> {
    try {
      const database = await this.getDb();
      const result = await database.run("DELETE FROM evidence_cache");
      return result.changes ?? 0;
    } catch (err) {
      console.error("[Evidence-Cache] Error clearing cache:", err);
      return 0;
    }
  }

  async getStats(): Promise<EvidenceCacheStats> {
    const database = await this.getDb();
    const now = new Date().toISOString();

    const totalRow = await database.get<{ count: number }>("SELECT COUNT(*) as count FROM evidence_cache");
    const validRow = await database.get<{ count: number }>(
      "SELECT COUNT(*) as count FROM evidence_cache WHERE expires_at > ?",
      [now],
    );
    const documentsRow = await database.get<{ count: number }>(
      "SELECT COUNT(DISTINCT document_id) as count FROM evidence_cache WHERE expires_at > ?",
      [now],
    );
    const backendRows = await database.all<Array<{ backend: string; count: number }>>(
      "SELECT backend, COUNT(*) as count FROM evidence_cache WHERE expires_at > ? GROUP BY backend",
      [now],
    );
    const oldestRow = await database.get<{ cached_at: string }>(
      "SELECT cached_at FROM evidence_cache WHERE expires_at > ? ORDER BY cached_at ASC LIMIT 1",
      [now],
    );
    const newestRow = await database.get<{ cached_at: string }>(
      "SELECT cached_at FROM evidence_cache ORDER BY cached_at DESC LIMIT 1",
    );

    const backendBreakdown: Record<string, number> = {};
    for (const row of backendRows) {
      backendBreakdown[row.backend] = row.count;
    }

    const totalEntries = totalRow?.count ?? 0;
    const validEntries = validRow?.count ?? 0;

    return {
      totalEntries,
      validEntries,
      expiredEntries: totalEntries - validEntries,
      documents: documentsRow?.count ?? 0,
      backendBreakdown,
      oldestEntry: oldestRow?.cached_at ?? null,
      newestEntry: newestRow?.cached_at ?? null,
      dbSizeBytes: fs.existsSync(this.dbPath) ? fs.statSync(this.dbPath).size : null,
    };
  }

  /**
   * Run-start housekeeping: drop expired rows, or every row when `clear` is set.
   */
  async prepareForRun(options: { clear: boolean }): Promise<number> {
    if (!this.config.enabled) return 0;
    if (!options.clear) return this.cleanupExpired();
    const removed = await this.clearAll();
    console.log(`[Evidence-Cache] Cleared ${removed} entries`);
    return removed;
  }

  async close(): Promise<void> {
    if (this.db) {
      await this.db.close();
      this.db = null;
      this.dbPromise = null;
    }
  }
}
