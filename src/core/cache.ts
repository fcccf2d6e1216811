import Database from 'better-sqlite3';
import { createHash } from 'node:crypto';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync, unlinkSync } from 'node:fs';

/**
 * SQLite database for holdings-history.
 *
 * Holds the HTTP response cache (submissions and filing documents) and is
 * shared with the holdings store. Filing documents never change once
 * accepted, so they are cached for a long time; submissions indexes are
 * refreshed daily.
 *
 * If the DB can't be opened it's deleted and recreated. The response cache
 * is non-critical: losing it just means re-fetching from SEC.
 */

const DB_FILE = 'holdings.db';

let cacheDir = join(homedir(), '.holdings-history');
let db: Database.Database | null = null;

/** In-memory FIFO cache for hot-path cache hits within a session */
const memCache = new Map<string, { body: string; expiresAt: number }>();
const MEM_CACHE_MAX = 100;

const HTTP_CACHE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS http_cache (
    url_hash TEXT PRIMARY KEY,
    url TEXT NOT NULL,
    response_body TEXT NOT NULL,
    fetched_at TEXT NOT NULL,
    expires_at TEXT NOT NULL
  )
`;

/** Point the database at another directory (closes any open handle) */
export function configureCache(dir: string): void {
  if (dir === cacheDir) return;
  closeCache();
  memCache.clear();
  cacheDir = dir;
}

export function getCacheLocation(): string {
  return join(cacheDir, DB_FILE);
}

function openDb(path: string): Database.Database {
  const handle = new Database(path);
  handle.pragma('journal_mode = WAL');
  handle.pragma('busy_timeout = 3000');
  handle.exec(HTTP_CACHE_SCHEMA);
  return handle;
}

export function getDb(): Database.Database {
  if (db) return db;

  mkdirSync(cacheDir, { recursive: true });
  const path = getCacheLocation();

  try {
    db = openDb(path);
  } catch {
    // DB corrupted: delete and recreate
    for (const suffix of ['', '-wal', '-shm']) {
      try { unlinkSync(path + suffix); } catch { /* not there */ }
    }
    db = openDb(path);
  }

  return db;
}

function hashUrl(url: string): string {
  return createHash('sha256').update(url).digest('hex');
}

/** Get cached response if still valid */
export function getCached(url: string): string | null {
  const hash = hashUrl(url);
  const now = Date.now();

  const mem = memCache.get(hash);
  if (mem && mem.expiresAt > now) return mem.body;

  const d = getDb();
  const row = d.prepare(
    'SELECT response_body, expires_at FROM http_cache WHERE url_hash = ? AND expires_at > ?'
  ).get(hash, new Date(now).toISOString()) as { response_body: string; expires_at: string } | undefined;

  if (row) {
    setMemCache(hash, row.response_body, new Date(row.expires_at).getTime());
    return row.response_body;
  }

  return null;
}

/** Store response in cache */
export function setCache(url: string, body: string, ttlHours: number = 24): void {
  const hash = hashUrl(url);
  const now = new Date();
  const expiresAt = now.getTime() + ttlHours * 60 * 60 * 1000;

  setMemCache(hash, body, expiresAt);

  const d = getDb();
  d.prepare(`
    INSERT OR REPLACE INTO http_cache (url_hash, url, response_body, fetched_at, expires_at)
    VALUES (?, ?, ?, ?, ?)
  `).run(hash, url, body, now.toISOString(), new Date(expiresAt).toISOString());
}

function setMemCache(hash: string, body: string, expiresAt: number): void {
  if (memCache.size >= MEM_CACHE_MAX) {
    // Evict oldest entry
    const firstKey = memCache.keys().next().value;
    if (firstKey) memCache.delete(firstKey);
  }
  memCache.set(hash, { body, expiresAt });
}

export function closeCache(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/** Clear cached HTTP responses. Stored holdings are kept. */
export function clearCache(): void {
  memCache.clear();
  const d = getDb();
  d.exec('DELETE FROM http_cache');
}

/** Get cache stats for diagnostics */
export function getCacheStats(): { entries: number; sizeBytes: number } {
  const d = getDb();
  const row = d.prepare(
    'SELECT COUNT(*) as count, COALESCE(SUM(LENGTH(response_body)), 0) as size FROM http_cache'
  ).get() as { count: number; size: number };
  return { entries: row.count, sizeBytes: row.size };
}
