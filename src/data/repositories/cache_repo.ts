/**
 * Result cache for serialized aggregate views (dashboards, performance)
 *
 * Entries expire ttl_seconds after last_updated. Writers of the underlying
 * data invalidate keys explicitly; expiry is only the upper bound.
 */

import type { SqliteDatabase } from '../db';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('cache_repo');

export interface CacheEntry {
  key: string;
  payload: string;
  lastUpdated: number;
  ttlSeconds: number;
  hitCount: number;
}

export interface ResultCacheOptions {
  defaultTtlSeconds: number;
  clock?: () => number;
}

export class ResultCache {
  private readonly defaultTtlSeconds: number;
  private readonly clock: () => number;
  private readonly generations = new Map<string, number>();

  constructor(
    private readonly db: SqliteDatabase,
    options: ResultCacheOptions
  ) {
    this.defaultTtlSeconds = options.defaultTtlSeconds;
    this.clock = options.clock ?? Date.now;
  }

  getEntry(key: string): CacheEntry | null {
    const stmt = this.db.prepare<[string], CacheEntry>(`
      SELECT key, payload, last_updated as lastUpdated, ttl_seconds as ttlSeconds, hit_count as hitCount
      FROM result_cache
      WHERE key = ?
    `);

    return stmt.get(key) ?? null;
  }

  /**
   * Returns the cached payload when present and unexpired; counts the hit.
   */
  get(key: string): string | null {
    const entry = this.getEntry(key);
    if (!entry) {
      logger.debug({ key }, 'Cache miss');
      return null;
    }

    const expiresAt = entry.lastUpdated + entry.ttlSeconds * 1000;
    if (this.clock() >= expiresAt) {
      logger.debug({ key }, 'Cache entry expired');
      return null;
    }

    this.db.prepare<[string]>('UPDATE result_cache SET hit_count = hit_count + 1 WHERE key = ?').run(key);
    logger.debug({ key }, 'Cache hit');
    return entry.payload;
  }

  set(key: string, payload: string, ttlSeconds: number = this.defaultTtlSeconds): void {
    const stmt = this.db.prepare<[string, string, number, number]>(`
      INSERT INTO result_cache (key, payload, last_updated, ttl_seconds, hit_count)
      VALUES (?, ?, ?, ?, 0)
      ON CONFLICT(key) DO UPDATE SET
        payload = excluded.payload,
        last_updated = excluded.last_updated,
        ttl_seconds = excluded.ttl_seconds,
        hit_count = 0
    `);

    stmt.run(key, payload, this.clock(), ttlSeconds);
    logger.debug({ key, ttlSeconds }, 'Cache set');
  }

  invalidate(key: string): boolean {
    const result = this.db.prepare<[string]>('DELETE FROM result_cache WHERE key = ?').run(key);
    if (result.changes > 0) {
      logger.debug({ key }, 'Cache invalidated');
    }
    return result.changes > 0;
  }

  /**
   * Removes every key starting with prefix (LIKE wildcards in prefix are escaped).
   */
  invalidateByPrefix(prefix: string): number {
    const escaped = prefix.replace(/[\\%_]/g, (ch) => `\\${ch}`);
    const result = this.db
      .prepare<[string]>("DELETE FROM result_cache WHERE key LIKE ? ESCAPE '\\'")
      .run(`${escaped}%`);
    return result.changes;
  }

  /**
   * Bumped by every invalidateBySuffix(suffix). A builder that reads its
   * inputs, awaits, then writes compares generations to detect an
   * invalidation that happened in between.
   */
  getGeneration(suffix: string): number {
    return this.generations.get(suffix) ?? 0;
  }

  /**
   * Removes every key ending with suffix, e.g. ':user-1' for all views of a user.
   */
  invalidateBySuffix(suffix: string): number {
    this.generations.set(suffix, this.getGeneration(suffix) + 1);
    const escaped = suffix.replace(/[\\%_]/g, (ch) => `\\${ch}`);
    const result = this.db
      .prepare<[string]>("DELETE FROM result_cache WHERE key LIKE ? ESCAPE '\\'")
      .run(`%${escaped}`);
    return result.changes;
  }

  getStats(): { totalEntries: number; totalHits: number; expiredCount: number } {
    const totals = this.db
      .prepare<[], { count: number; hits: number | null }>(
        'SELECT COUNT(*) as count, SUM(hit_count) as hits FROM result_cache'
      )
      .get();
    const expired = this.db
      .prepare<[number], { count: number }>(`
        SELECT COUNT(*) as count
        FROM result_cache
        WHERE last_updated + (ttl_seconds * 1000) <= ?
      `)
      .get(this.clock());

    return {
      totalEntries: totals?.count ?? 0,
      totalHits: totals?.hits ?? 0,
      expiredCount: expired?.count ?? 0,
    };
  }

  cleanupExpired(): number {
    const result = this.db
      .prepare<[number]>(`
        DELETE FROM result_cache
        WHERE last_updated + (ttl_seconds * 1000) <= ?
      `)
      .run(this.clock());

    if (result.changes > 0) {
      logger.info({ removed: result.changes }, 'Cleaned up expired cache entries');
    }

    return result.changes;
  }
}
