import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import NodeCache from 'node-cache';
import { z } from 'zod';
import type { PriceCache } from '../core/pricing/PriceCachePort';
import type { PriceSnapshot } from '../core/types';
import { createLogger } from '../utils/logger';

const logger = createLogger('price-cache');

/**
 * In-process cache, one per session when no cache file is configured.
 */
export class MemoryPriceCache implements PriceCache {
  private readonly cache: NodeCache;

  constructor() {
    this.cache = new NodeCache({
      checkperiod: 600, // sweep expired keys every 10 minutes
      useClones: true,
    });
  }

  get(key: string): PriceSnapshot | undefined {
    return this.cache.get<PriceSnapshot>(key);
  }

  set(key: string, snapshot: PriceSnapshot, ttlSeconds: number): void {
    // node-cache reads a TTL of 0 as "never expires"
    if (ttlSeconds <= 0) return;
    this.cache.set(key, snapshot, ttlSeconds);
  }

  delete(key: string): void {
    this.cache.del(key);
  }

  stats(): { keys: number; hits: number; misses: number } {
    const { keys, hits, misses } = this.cache.getStats();
    return { keys, hits, misses };
  }

  close(): void {
    this.cache.flushAll();
    this.cache.close();
  }
}

const PriceSnapshotSchema = z.object({
  count: z.number(),
  prices: z.array(z.number()),
  mean: z.number(),
  median: z.number(),
  min: z.number(),
  max: z.number(),
  stdDev: z.number(),
  query: z.string(),
  cachedAt: z.string(),
  filtered: z.boolean(),
  broadened: z.boolean(),
  source: z.enum(['live', 'cache', 'unavailable', 'error']),
});

interface CacheRow {
  snapshot: string;
}

/**
 * SQLite-backed cache shared by every session. Entries survive restarts.
 */
export const DEFAULT_PURGE_INTERVAL_MS = 60 * 60 * 1000;

export class SqlitePriceCache implements PriceCache {
  private readonly db: Database.Database;
  private readonly purgeTimer?: NodeJS.Timeout;
  private hits = 0;
  private misses = 0;

  constructor(
    dbPath: string,
    private readonly now: () => number = Date.now,
    purgeIntervalMs: number = DEFAULT_PURGE_INTERVAL_MS
  ) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS price_cache (
        cache_key TEXT PRIMARY KEY,
        snapshot TEXT NOT NULL,
        query TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL
      )
    `);

    const purged = this.purgeExpired();
    if (purgeIntervalMs > 0) {
      this.purgeTimer = setInterval(() => {
        const removed = this.purgeExpired();
        if (removed > 0) {
          logger.debug('Purged expired price entries', { removed });
        }
      }, purgeIntervalMs);
      this.purgeTimer.unref();
    }
    logger.info('Price cache opened', { dbPath, purged });
  }

  get(key: string): PriceSnapshot | undefined {
    const row = this.db
      .prepare<[string, number], CacheRow>(
        'SELECT snapshot FROM price_cache WHERE cache_key = ? AND expires_at > ?'
      )
      .get(key, this.now());

    if (!row) {
      this.misses++;
      return undefined;
    }

    const parsed = PriceSnapshotSchema.safeParse(JSON.parse(row.snapshot));
    if (!parsed.success) {
      logger.warn('Discarding unreadable cache entry', { key });
      this.delete(key);
      this.misses++;
      return undefined;
    }
    this.hits++;
    return parsed.data;
  }

  set(key: string, snapshot: PriceSnapshot, ttlSeconds: number): void {
    if (ttlSeconds <= 0) return;
    const createdAt = this.now();
    this.db
      .prepare(
        'INSERT OR REPLACE INTO price_cache (cache_key, snapshot, query, created_at, expires_at) VALUES (?, ?, ?, ?, ?)'
      )
      .run(key, JSON.stringify(snapshot), snapshot.query, createdAt, createdAt + ttlSeconds * 1000);
  }

  delete(key: string): void {
    this.db.prepare('DELETE FROM price_cache WHERE cache_key = ?').run(key);
  }

  purgeExpired(): number {
    return this.db.prepare('DELETE FROM price_cache WHERE expires_at <= ?').run(this.now()).changes;
  }

  stats(): { keys: number; hits: number; misses: number } {
    const row = this.db
      .prepare<[number], { keys: number }>('SELECT COUNT(*) AS keys FROM price_cache WHERE expires_at > ?')
      .get(this.now());
    return { keys: row?.keys ?? 0, hits: this.hits, misses: this.misses };
  }

  close(): void {
    clearInterval(this.purgeTimer);
    if (this.db.open) {
      this.db.close();
    }
  }
}
