import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CacheRepository } from '../../src/db/cache-repository';
import { initializeSchema } from '../../src/db/connection';
import { createSilentLogger } from '../../src/lib/logger';
import { createTempDatabase } from '../mocks/config.mock';

describe('CacheRepository', () => {
  const logger = createSilentLogger();
  let database: ReturnType<typeof createTempDatabase>;
  let now: Date;
  let cache: CacheRepository;

  beforeEach(() => {
    database = createTempDatabase();
    initializeSchema(database.path, logger);
    now = new Date('2024-03-01T12:00:00.000Z');
    cache = new CacheRepository(database.path, logger, () => now);
  });

  afterEach(() => {
    database.cleanup();
  });

  it('should return the absolute expiry of a stored entry', () => {
    expect(cache.set('repo:acme/widgets', '{"stars":1}', 60)).toBe('2024-03-01T12:01:00.000Z');
  });

  it('should return a live entry', () => {
    cache.set('repo:acme/widgets', '{"stars":1}', 60);
    now = new Date('2024-03-01T12:00:59.000Z');

    expect(cache.get('repo:acme/widgets')).toEqual({
      found: true,
      cache_key: 'repo:acme/widgets',
      data: '{"stars":1}',
    });
  });

  it('should report an unknown key as not found', () => {
    expect(cache.get('missing')).toEqual({ found: false });
  });

  it('should evict an expired entry on read', () => {
    cache.set('repo:acme/widgets', 'stale', 60);
    now = new Date('2024-03-01T12:01:01.000Z');

    expect(cache.get('repo:acme/widgets')).toEqual({ found: false, expired: true });
    expect(cache.get('repo:acme/widgets')).toEqual({ found: false });
    expect(cache.listAll()).toEqual([]);
  });

  it('should keep listing an expired entry until it is read', () => {
    cache.set('repo:acme/widgets', 'stale', 60);
    now = new Date('2024-03-01T12:01:01.000Z');

    expect(cache.listAll().map(entry => entry.cache_key)).toEqual(['repo:acme/widgets']);

    cache.get('repo:acme/widgets');

    expect(cache.listAll()).toEqual([]);
  });

  it('should replace an entry stored under the same key', () => {
    cache.set('key', 'first', 60);
    cache.set('key', 'second', 120);

    expect(cache.listAll()).toEqual([
      {
        cache_key: 'key',
        data: 'second',
        created_at: '2024-03-01T12:00:00.000Z',
        expires_at: '2024-03-01T12:02:00.000Z',
      },
    ]);
  });

  it('should clear every entry and report how many were removed', () => {
    cache.set('a', '1', 60);
    cache.set('b', '2', 60);

    expect(cache.clear()).toBe(2);
    expect(cache.listAll()).toEqual([]);
  });
});
