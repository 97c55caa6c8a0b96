import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CacheIndex } from './cache-index.js';
import { enforceStorageLimits, isOverLimits } from './eviction.js';
import { SqliteKeyValueStore } from '../db/kv-store.js';
import { makeTempDir } from '../testing/fake-fetcher.js';

describe('enforceStorageLimits', () => {
  let root: string;
  let store: SqliteKeyValueStore;
  let index: CacheIndex;

  // Entries "e0".."e{n-1}", e0 least recently used
  function fill(count: number, sizeBytes: number): void {
    for (let i = 0; i < count; i++) {
      const id = `e${i}`;
      const localPath = index.pathFor(id);
      fs.writeFileSync(localPath, 'x');
      index.commit({ id, sourceUrl: `https://cdn.test/${id}`, localPath, sizeBytes, createdAt: i, lastAccessedAt: i });
    }
  }

  beforeEach(async () => {
    root = await makeTempDir();
    store = new SqliteKeyValueStore(':memory:');
    index = new CacheIndex(store, { cacheDir: root, fileExtension: '.m4a' });
  });

  afterEach(() => {
    store.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('does nothing under both limits', () => {
    fill(10, 100);
    const limits = { maxCacheBytes: 10_000, maxCachedFiles: 10 };

    expect(isOverLimits(index, limits)).toBe(false);
    expect(enforceStorageLimits(index, limits)).toEqual([]);
    expect(enforceStorageLimits(index, limits)).toEqual([]);
    expect(index.count).toBe(10);
  });

  it('evicts the oldest 20% when the file count is exceeded', () => {
    fill(11, 1);

    const evicted = enforceStorageLimits(index, { maxCacheBytes: 1_000_000, maxCachedFiles: 10 });

    // ceil(11 * 0.2) = 3
    expect(evicted).toEqual(['e0', 'e1', 'e2']);
    expect(index.count).toBe(8);
    expect(fs.existsSync(path.join(root, 'e0.m4a'))).toBe(false);
    expect(fs.existsSync(path.join(root, 'e3.m4a'))).toBe(true);
  });

  it('evicts when total bytes exceed the quota', () => {
    const mb = 1024 * 1024;
    fill(60, 2 * mb);

    const evicted = enforceStorageLimits(index, { maxCacheBytes: 100 * mb, maxCachedFiles: 100 });

    expect(evicted).toHaveLength(12);
    expect(evicted[0]).toBe('e0');
    expect(evicted[11]).toBe('e11');
    expect(index.totalBytes).toBe(48 * 2 * mb);
  });

  it('orders by last access, not by insertion', () => {
    fill(6, 1);
    const first = index.get('e0');
    if (first) first.lastAccessedAt = 100;

    const evicted = enforceStorageLimits(index, { maxCacheBytes: 1_000, maxCachedFiles: 5 });

    // ceil(6 * 0.2) = 2
    expect(evicted).toEqual(['e1', 'e2']);
    expect(index.isCached('e0')).toBe(true);
  });

  it('never evicts protected ids', () => {
    fill(6, 1);

    const evicted = enforceStorageLimits(index, { maxCacheBytes: 1_000, maxCachedFiles: 5 }, id => id === 'e0');

    // 5 candidates -> ceil(5 * 0.2) = 1
    expect(evicted).toEqual(['e1']);
    expect(index.isCached('e0')).toBe(true);
  });
});
