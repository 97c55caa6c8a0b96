import * as fs from 'fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ActiveTransferSet } from './active-transfers.js';
import { CacheIndex } from './cache-index.js';
import { DownloadQueue } from './download-queue.js';
import { SqliteKeyValueStore } from '../db/kv-store.js';
import { makeTempDir } from '../testing/fake-fetcher.js';
import type { DownloadPriority, DownloadTask } from '../types/cache.js';

function task(id: string, priority: DownloadPriority = 'normal'): DownloadTask {
  return { id, sourceUrl: `https://cdn.test/${id}`, priority, attempts: 0, status: 'queued' };
}

describe('DownloadQueue', () => {
  let root: string;
  let store: SqliteKeyValueStore;
  let index: CacheIndex;
  let active: ActiveTransferSet;
  let queue: DownloadQueue;

  beforeEach(async () => {
    root = await makeTempDir();
    store = new SqliteKeyValueStore(':memory:');
    index = new CacheIndex(store, { cacheDir: root, fileExtension: '.m4a' });
    active = new ActiveTransferSet(2);
    queue = new DownloadQueue(index, active);
  });

  afterEach(() => {
    store.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('orders by priority, first come first served within a priority', () => {
    queue.enqueue(task('low-1', 'low'));
    queue.enqueue(task('normal-1'));
    queue.enqueue(task('high-1', 'high'));
    queue.enqueue(task('normal-2'));
    queue.enqueue(task('high-2', 'high'));
    queue.enqueue(task('low-2', 'low'));

    expect(queue.ids()).toEqual(['high-1', 'high-2', 'normal-1', 'normal-2', 'low-1', 'low-2']);
  });

  it('ignores ids that are queued, active or cached', () => {
    const localPath = index.pathFor('cached');
    fs.writeFileSync(localPath, 'x');
    index.commit({ id: 'cached', sourceUrl: 'u', localPath, sizeBytes: 1, createdAt: 1, lastAccessedAt: 1 });
    active.add('running');

    expect(queue.enqueue(task('a'))).toBe(true);
    expect(queue.enqueue(task('a', 'high'))).toBe(false);
    expect(queue.enqueue(task('running'))).toBe(false);
    expect(queue.enqueue(task('cached'))).toBe(false);
    expect(queue.size).toBe(1);
  });

  it('only dequeues while a transfer slot is free', () => {
    queue.enqueue(task('a'));
    queue.enqueue(task('b'));
    queue.enqueue(task('c'));

    const first = queue.dequeueNext();
    expect(first?.id).toBe('a');
    active.add('a');
    const second = queue.dequeueNext();
    expect(second?.id).toBe('b');
    active.add('b');

    expect(queue.dequeueNext()).toBeNull();
    expect(queue.size).toBe(1);

    active.delete('a');
    expect(queue.dequeueNext()?.id).toBe('c');
    expect(queue.dequeueNext()).toBeNull();
  });

  it('does not preempt running transfers for a later high priority task', () => {
    queue.enqueue(task('a', 'low'));
    queue.enqueue(task('b', 'low'));
    active.add(queue.dequeueNext()?.id ?? '');
    active.add(queue.dequeueNext()?.id ?? '');

    queue.enqueue(task('urgent', 'high'));

    expect(active.ids()).toEqual(['a', 'b']);
    expect(queue.dequeueNext()).toBeNull();
  });

  it('removes a queued task by id', () => {
    queue.enqueue(task('a'));
    queue.enqueue(task('b'));

    expect(queue.remove('a')?.id).toBe('a');
    expect(queue.remove('a')).toBeNull();
    expect(queue.ids()).toEqual(['b']);
  });
});
