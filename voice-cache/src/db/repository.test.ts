import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqliteKeyValueStore } from './kv-store.js';
import { METADATA_KEY, loadCacheEntries, saveCacheEntries } from './repository.js';
import type { CacheEntry } from '../types/cache.js';

describe('cache metadata repository', () => {
  let store: SqliteKeyValueStore;

  const entry: CacheEntry = {
    id: 'm1',
    sourceUrl: 'https://cdn.test/a.m4a',
    localPath: '/cache/m1.m4a',
    sizeBytes: 2048,
    createdAt: 1000,
    lastAccessedAt: 2000,
  };

  beforeEach(() => {
    store = new SqliteKeyValueStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('returns no entries for an empty store', () => {
    expect(loadCacheEntries(store)).toEqual([]);
  });

  it('round-trips the whole table', () => {
    saveCacheEntries(store, [entry, { ...entry, id: 'm2', localPath: '/cache/m2.m4a' }]);

    const loaded = loadCacheEntries(store);
    expect(loaded).toHaveLength(2);
    expect(loaded[0]).toEqual(entry);
    expect(loaded[1].id).toBe('m2');
  });

  it('stores the table keyed by id', () => {
    saveCacheEntries(store, [entry]);

    expect(JSON.parse(store.read(METADATA_KEY) ?? '{}')).toEqual({
      m1: {
        sourceUrl: 'https://cdn.test/a.m4a',
        localPath: '/cache/m1.m4a',
        sizeBytes: 2048,
        createdAt: 1000,
        lastAccessedAt: 2000,
      },
    });
  });

  it('skips malformed records', () => {
    store.write(METADATA_KEY, JSON.stringify({
      good: { sourceUrl: 'u', localPath: '/p', sizeBytes: 1, createdAt: 1, lastAccessedAt: 1 },
      bad: { sourceUrl: 'u', localPath: '/p', sizeBytes: 'big' },
    }));

    const loaded = loadCacheEntries(store);
    expect(loaded.map(e => e.id)).toEqual(['good']);
  });

  it('starts empty when the blob is not JSON', () => {
    store.write(METADATA_KEY, '{not json');
    expect(loadCacheEntries(store)).toEqual([]);
  });

  it('erase removes the table', () => {
    saveCacheEntries(store, [entry]);
    store.erase();
    expect(store.read(METADATA_KEY)).toBeNull();
  });
});
