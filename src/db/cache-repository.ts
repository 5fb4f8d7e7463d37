import type { Logger } from '../lib/logger';
import type { CacheEntry, CacheLookup } from '../types/stats';
import { withConnection } from './connection';

interface CacheRow {
  cache_key: string;
  data: string;
  created_at: string;
  expires_at: string;
}

export type Clock = () => Date;

/**
 * Key/value cache in SQLite. Entries expire at an absolute instant and are
 * evicted lazily when read.
 */
export class CacheRepository {
  private readonly logger: Logger;

  constructor(
    private readonly databasePath: string,
    logger: Logger,
    private readonly now: Clock = () => new Date()
  ) {
    this.logger = logger.child({ component: 'cache-repository' });
  }

  set(key: string, data: string, ttlSeconds: number): string {
    const created = this.now();
    const expiresAt = new Date(created.getTime() + ttlSeconds * 1000).toISOString();

    withConnection(this.databasePath, 'cache-set', db => {
      db.prepare(
        `INSERT OR REPLACE INTO github_cache (cache_key, data, created_at, expires_at)
         VALUES (?, ?, ?, ?)`
      ).run(key, data, created.toISOString(), expiresAt);
    });

    this.logger.debug({ key, expiresAt }, 'Cache entry stored');
    return expiresAt;
  }

  get(key: string): CacheLookup {
    return withConnection<CacheLookup>(this.databasePath, 'cache-get', db => {
      const row = db
        .prepare<[string], CacheRow>('SELECT * FROM github_cache WHERE cache_key = ?')
        .get(key);

      if (!row) {
        return { found: false };
      }

      if (Date.parse(row.expires_at) < this.now().getTime()) {
        db.prepare('DELETE FROM github_cache WHERE cache_key = ?').run(key);
        this.logger.debug({ key }, 'Cache entry expired');
        return { found: false, expired: true };
      }

      return { found: true, cache_key: key, data: row.data };
    });
  }

  clear(): number {
    const deleted = withConnection(this.databasePath, 'cache-clear', db =>
      db.prepare('DELETE FROM github_cache').run().changes
    );
    this.logger.info({ deleted }, 'Cache cleared');
    return deleted;
  }

  /**
   * Every stored entry, expired ones included until they are read
   */
  listAll(): CacheEntry[] {
    return withConnection(this.databasePath, 'cache-list', db =>
      db
        .prepare<[], CacheRow>('SELECT cache_key, data, created_at, expires_at FROM github_cache ORDER BY id')
        .all()
    );
  }
}
