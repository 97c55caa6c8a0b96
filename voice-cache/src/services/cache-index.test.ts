import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CacheIndex } from './cache-index.js';
import { SqliteKeyValueStore } from '../db/kv-store.js';
import { loadCacheEntries } from '../db/repository.js';
import { makeTempDir } from '../testing/fake-fetcher.js';
import type { CacheEntry } from '../types/cache.js';

describe('CacheIndex', () => {
  let root: string;
  let cacheDir: string;
  let dataDir: string;
  let store: SqliteKeyValueStore;
  let now: number;

  const newIndex = () => new CacheIndex(store, { cacheDir, fileExtension: '.m4a', clock: () => now });

  function writeEntryFile(index: CacheIndex, id: string, bytes = 10): CacheEntry {
    const localPath = index.pathFor(id);
    fs.writeFileSync(localPath, Buffer.alloc(bytes));
    return { id, sourceUrl: `https://cdn.test/${id}`, localPath, sizeBytes: bytes, createdAt: now, lastAccessedAt: now };
  }

  beforeEach(async () => {
    root = await makeTempDir();
    cacheDir = path.join(root, 'cache');
    dataDir = path.join(root, 'data');
    fs.mkdirSync(cacheDir, { recursive: true });
    store = new SqliteKeyValueStore(dataDir);
    now = 1_000;
  });

  afterEach(() => {
    store.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('maps ids to files in the cache directory', () => {
    const index = newIndex();
    expect(index.pathFor('m1')).toBe(path.join(cacheDir, 'm1.m4a'));
    expect(index.pathFor('chat/42')).toBe(path.join(cacheDir, 'chat%2F42.m4a'));
  });

  it('commits entries and tracks totals', () => {
    const index = newIndex();
    index.commit(writeEntryFile(index, 'a', 10));
    index.commit(writeEntryFile(index, 'b', 30));

    expect(index.isCached('a')).toBe(true);
    expect(index.getPath('b')).toBe(path.join(cacheDir, 'b.m4a'));
    expect(index.count).toBe(2);
    expect(index.totalBytes).toBe(40);
  });

  it('survives a reload with identical metadata', () => {
    const index = newIndex();
    const entry = writeEntryFile(index, 'm1', 64);
    index.commit(entry);
    store.close();

    store = new SqliteKeyValueStore(dataDir);
    const reloaded = newIndex();
    reloaded.load();

    const loaded = reloaded.get('m1');
    expect(loaded?.sourceUrl).toBe(entry.sourceUrl);
    expect(loaded?.localPath).toBe(entry.localPath);
    expect(loaded?.sizeBytes).toBe(64);
  });

  it('drops entries without a file and deletes orphan files on load', () => {
    const index = newIndex();
    const kept = writeEntryFile(index, 'kept');
    const gone = writeEntryFile(index, 'gone');
    index.commit(kept);
    index.commit(gone);
    fs.unlinkSync(gone.localPath);
    const orphan = path.join(cacheDir, 'orphan.m4a');
    fs.writeFileSync(orphan, 'x');
    fs.mkdirSync(path.join(cacheDir, '.partial'));

    const reloaded = newIndex();
    const report = reloaded.load();

    expect(report).toEqual({ loaded: 2, droppedEntries: 1, orphanFiles: 1 });
    expect(reloaded.isCached('kept')).toBe(true);
    expect(reloaded.isCached('gone')).toBe(false);
    expect(fs.existsSync(orphan)).toBe(false);
    expect(fs.existsSync(path.join(cacheDir, '.partial'))).toBe(true);
    expect(loadCacheEntries(store).map(e => e.id)).toEqual(['kept']);
  });

  it('touch updates last access time and writes through', () => {
    const index = newIndex();
    index.commit(writeEntryFile(index, 'm1'));
    now = 5_000;

    index.touch('m1');

    expect(index.get('m1')?.lastAccessedAt).toBe(5_000);
    expect(loadCacheEntries(store)[0].lastAccessedAt).toBe(5_000);
  });

  it('remove deletes the file then the entry, and ignores unknown ids', () => {
    const index = newIndex();
    const entry = writeEntryFile(index, 'm1', 12);
    index.commit(entry);

    expect(index.remove('m1')).toBe(true);
    expect(fs.existsSync(entry.localPath)).toBe(false);
    expect(index.isCached('m1')).toBe(false);
    expect(index.totalBytes).toBe(0);
    expect(index.remove('m1')).toBe(false);
    expect(index.remove('never-there')).toBe(false);
  });

  it('clear empties the directory and the store', () => {
    const index = newIndex();
    index.commit(writeEntryFile(index, 'a'));
    fs.writeFileSync(path.join(cacheDir, 'stray.m4a'), 'x');

    index.clear();

    expect(index.count).toBe(0);
    expect(fs.readdirSync(cacheDir)).toEqual([]);
    expect(loadCacheEntries(store)).toEqual([]);
  });
});
