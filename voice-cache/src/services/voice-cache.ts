import * as fs from 'fs';
import * as fsPromises from 'fs/promises';
import * as path from 'path';
import { ActiveTransferSet } from './active-transfers.js';
import { CacheIndex, type ReconcileReport } from './cache-index.js';
import { DownloadQueue } from './download-queue.js';
import { enforceStorageLimits, type EvictionLimits } from './eviction.js';
import type { Fetcher } from './fetcher.js';
import { ProgressChannel, type ProgressListener } from './progress.js';
import { RetryScheduler } from './retry-scheduler.js';
import { WorkerPool } from './worker-pool.js';
import type { KeyValueStore } from '../db/kv-store.js';
import type {
  CacheStats,
  DownloadPriority,
  DownloadStatus,
  DownloadTask,
  FailureReason,
  FileResult,
  PrefetchRequest,
} from '../types/cache.js';
import { errorMessage } from '../utils/errors.js';
import { ensureDir, moveFileAsync, removeFile, removeFileAsync } from '../utils/files.js';

export interface VoiceCacheOptions {
  cacheDir: string;
  store: KeyValueStore;
  fetcher: Fetcher;
  maxCacheBytes?: number;
  maxCachedFiles?: number;
  maxConcurrentDownloads?: number;
  maxAttempts?: number;
  retryDelaysMs?: number[];
  waitTimeoutMs?: number;
  fileExtension?: string;
  minFileBytes?: number;
  clock?: () => number;
}

export const DEFAULTS = {
  maxCacheBytes: 100 * 1024 * 1024,
  maxCachedFiles: 50,
  maxConcurrentDownloads: 3,
  maxAttempts: 3,
  retryDelaysMs: [2000, 5000, 10000],
  waitTimeoutMs: 2 * 60 * 1000,
  fileExtension: '.m4a',
  minFileBytes: 1,
} as const;

export const PARTIAL_DIR = '.partial';

interface Waiter {
  resolve: (result: FileResult) => void;
  timer: NodeJS.Timeout;
}

type LifecycleState = 'created' | 'open' | 'closing' | 'closed';

/**
 * Download/cache engine for short audio files.
 *
 * Owns every cache entry and download task: the worker pool and eviction only
 * act through the callbacks below, and all bookkeeping runs synchronously on
 * the event loop between transfer suspension points.
 */
export class VoiceCache {
  private readonly index: CacheIndex;
  private readonly active: ActiveTransferSet;
  private readonly queue: DownloadQueue;
  private readonly retries: RetryScheduler;
  private readonly pool: WorkerPool;
  private readonly channel = new ProgressChannel();

  // Non-terminal tasks by id
  private readonly tasks = new Map<string, DownloadTask>();
  private readonly waiters = new Map<string, Set<Waiter>>();
  // Last known status, kept after a task ends
  private readonly statuses = new Map<string, DownloadStatus>();
  private readonly progress = new Map<string, number>();

  private readonly limits: EvictionLimits;
  private readonly maxAttempts: number;
  private readonly waitTimeoutMs: number;
  private readonly store: KeyValueStore;
  private state: LifecycleState = 'created';

  constructor(private readonly options: VoiceCacheOptions) {
    this.store = options.store;
    this.limits = {
      maxCacheBytes: options.maxCacheBytes ?? DEFAULTS.maxCacheBytes,
      maxCachedFiles: options.maxCachedFiles ?? DEFAULTS.maxCachedFiles,
    };
    this.maxAttempts = options.maxAttempts ?? DEFAULTS.maxAttempts;
    this.waitTimeoutMs = options.waitTimeoutMs ?? DEFAULTS.waitTimeoutMs;

    this.index = new CacheIndex(options.store, {
      cacheDir: options.cacheDir,
      fileExtension: options.fileExtension ?? DEFAULTS.fileExtension,
      clock: options.clock,
    });
    this.active = new ActiveTransferSet(options.maxConcurrentDownloads ?? DEFAULTS.maxConcurrentDownloads);
    this.queue = new DownloadQueue(this.index, this.active);
    this.retries = new RetryScheduler(options.retryDelaysMs ?? [...DEFAULTS.retryDelaysMs]);
    this.pool = new WorkerPool(
      this.queue,
      this.active,
      this.index,
      options.fetcher,
      {
        tempDir: this.partialDir,
        minFileBytes: options.minFileBytes ?? DEFAULTS.minFileBytes,
      },
      {
        onStart: task => this.handleStart(task),
        onProgress: (task, received, total) => this.handleProgress(task, received, total),
        onComplete: (task, finalPath, sizeBytes) => this.handleComplete(task, finalPath, sizeBytes),
        onCancelled: task => this.handleCancelled(task),
        onError: (task, error) => this.handleError(task, error),
      },
    );
  }

  get partialDir(): string {
    return path.join(this.options.cacheDir, PARTIAL_DIR);
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  /**
   * Create directories, drop leftovers of interrupted transfers and load the index
   */
  open(): ReconcileReport {
    if (this.state !== 'created') {
      throw new Error(`Cannot open voice cache in state ${this.state}`);
    }

    ensureDir(this.options.cacheDir);
    ensureDir(this.partialDir);
    for (const name of fs.readdirSync(this.partialDir)) {
      removeFile(path.join(this.partialDir, name), '[VoiceCache]');
    }

    const report = this.index.load();
    this.state = 'open';
    console.log(`[VoiceCache] Initialized with ${this.index.count} cached files`);
    return report;
  }

  /**
   * Abort transfers, drop pending retries, release waiters and close the store
   */
  async close(): Promise<void> {
    if (this.state !== 'open') {
      if (this.state === 'created') this.state = 'closed';
      return;
    }
    console.log('[VoiceCache] Shutting down...');
    this.state = 'closing';

    this.pool.stop();
    this.retries.cancelAll();
    for (const task of this.queue.clear()) {
      this.finish(task, 'cancelled');
    }
    for (const task of [...this.tasks.values()]) {
      if (task.status === 'retrying') {
        this.finish(task, 'cancelled');
      }
    }
    this.active.abortAll('Service shutting down');
    await this.pool.drain();

    for (const id of [...this.waiters.keys()]) {
      this.release(id, { ok: false, reason: 'closed' });
    }
    this.channel.closeAll();
    this.store.close();
    this.state = 'closed';
  }

  // ============ PUBLIC API ============

  /**
   * Local path for an id, downloading it if needed. Null when the file could not be obtained.
   */
  async getFile(id: string, url: string, priority: DownloadPriority = 'normal'): Promise<string | null> {
    const result = await this.requestFile(id, url, priority);
    return result.ok ? result.path : null;
  }

  /**
   * Same as getFile, with the reason for a failure
   */
  requestFile(id: string, url: string, priority: DownloadPriority = 'normal'): Promise<FileResult> {
    if (this.state !== 'open') {
      return Promise.resolve({ ok: false, reason: 'closed' });
    }
    if (!id || !url) {
      return Promise.resolve({ ok: false, reason: 'failed', error: 'id and url are required' });
    }

    // 1. Cache hit
    const cachedPath = this.lookup(id);
    if (cachedPath) {
      this.index.touch(id);
      console.log(`[VoiceCache] Cache hit: ${id}`);
      return Promise.resolve({ ok: true, path: cachedPath });
    }

    // 2. Already queued, downloading or retrying: wait for it
    const result = this.waitFor(id);
    if (this.tasks.has(id)) {
      console.log(`[VoiceCache] Already downloading: ${id}`);
      return result;
    }

    // 3. New task
    this.enqueueTask(id, url, priority);
    return result;
  }

  /**
   * Queue downloads without waiting for them. Returns how many were queued.
   */
  prefetch(requests: PrefetchRequest[]): number {
    if (this.state !== 'open') return 0;

    let queued = 0;
    for (const request of requests) {
      if (!request.id || !request.url) continue;
      if (this.lookup(request.id) || this.tasks.has(request.id)) continue;
      if (this.enqueueTask(request.id, request.url, request.priority ?? 'normal')) {
        queued++;
      }
    }
    console.log(`[VoiceCache] Pre-fetching ${queued} of ${requests.length} voice messages`);
    return queued;
  }

  /**
   * Put a file that already exists locally (a fresh recording) into the cache
   */
  async preCacheLocalFile(id: string, localPath: string, url: string): Promise<boolean> {
    if (this.state !== 'open') return false;

    const stagingPath = path.join(this.partialDir, `precache-${Date.now()}-${Math.random().toString(16).slice(2)}.part`);
    try {
      const { size } = await fsPromises.stat(localPath);
      await fsPromises.copyFile(localPath, stagingPath);
      if (this.state !== 'open') {
        await removeFileAsync(stagingPath, '[VoiceCache]');
        return false;
      }

      const finalPath = this.index.pathFor(id);
      await moveFileAsync(stagingPath, finalPath);
      this.commitEntry(id, url, finalPath, size);

      const pending = this.tasks.get(id);
      if (pending && (pending.status === 'queued' || pending.status === 'retrying')) {
        this.queue.remove(id);
        this.retries.cancel(id);
        this.finish(pending, 'completed', { ok: true, path: finalPath });
      } else if (!pending) {
        this.statuses.set(id, 'completed');
      }

      console.log(`[VoiceCache] Pre-cached local file: ${id} (${Math.floor(size / 1024)}KB)`);
      return true;
    } catch (error) {
      await removeFileAsync(stagingPath, '[VoiceCache]');
      console.error(`[VoiceCache] Pre-cache failed for ${id}: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Cancel a queued, retrying or running download.
   * Waiters are released with a failure once the partial file is gone.
   */
  cancel(id: string): boolean {
    const task = this.tasks.get(id);
    if (!task) return false;

    if (this.queue.remove(id) || this.retries.cancel(id)) {
      console.log(`[VoiceCache] Cancelled download: ${id}`);
      this.finish(task, 'cancelled', { ok: false, reason: 'cancelled' });
      return true;
    }

    if (this.active.abort(id, 'User cancelled')) {
      console.log(`[VoiceCache] Cancelling active download: ${id}`);
      return true;
    }
    return false;
  }

  isCached(id: string): boolean {
    return this.index.isCached(id);
  }

  isDownloading(id: string): boolean {
    return this.tasks.has(id);
  }

  /**
   * Cached path if the file is still on disk
   */
  getCachedPath(id: string): string | null {
    const cachedPath = this.index.getPath(id);
    return cachedPath && fs.existsSync(cachedPath) ? cachedPath : null;
  }

  getStatus(id: string): DownloadStatus | null {
    const task = this.tasks.get(id);
    if (task) return task.status;
    if (this.index.isCached(id)) return 'completed';
    return this.statuses.get(id) ?? null;
  }

  /**
   * Download progress between 0 and 1
   */
  getProgress(id: string): number {
    if (this.index.isCached(id)) return 1;
    return this.progress.get(id) ?? 0;
  }

  /**
   * Status and progress events for an id. The subscription ends with the task's
   * terminal status; for an id that is already cached nothing is emitted, so
   * call the returned function when done.
   */
  subscribe(id: string, listener: ProgressListener): () => void {
    return this.channel.subscribe(id, listener);
  }

  cacheSizeBytes(): number {
    return this.index.totalBytes;
  }

  cacheSizeMB(): number {
    return this.index.totalBytes / (1024 * 1024);
  }

  stats(): CacheStats {
    return {
      files: this.index.count,
      sizeBytes: this.index.totalBytes,
      sizeMB: Math.round(this.cacheSizeMB() * 100) / 100,
      queued: this.queue.size,
      active: this.active.size,
      retrying: this.retries.size,
    };
  }

  /**
   * Delete every cached file and the metadata table. In-flight downloads keep running.
   */
  clearCache(): void {
    if (this.state !== 'open') return;

    this.index.clear();
    for (const id of [...this.statuses.keys()]) {
      if (!this.tasks.has(id)) this.statuses.delete(id);
    }
    for (const id of [...this.progress.keys()]) {
      if (!this.tasks.has(id)) this.progress.delete(id);
    }
    console.log('[VoiceCache] Cache cleared');
  }

  // ============ TASKS ============

  /**
   * Path of a usable cached file. Entries whose file vanished or changed size are dropped.
   */
  private lookup(id: string): string | null {
    const entry = this.index.get(id);
    if (!entry) return null;

    let size: number | null = null;
    try {
      size = fs.statSync(entry.localPath).size;
    } catch {
      size = null;
    }
    if (size === entry.sizeBytes) {
      return entry.localPath;
    }

    console.log(`[VoiceCache] Cached file missing or corrupt, re-downloading: ${id}`);
    this.index.remove(id);
    return null;
  }

  /**
   * Create and queue a task. False when the queue refused it; the task is then already finished.
   */
  private enqueueTask(id: string, url: string, priority: DownloadPriority): boolean {
    const task: DownloadTask = { id, sourceUrl: url, priority, attempts: 0, status: 'queued' };
    this.tasks.set(id, task);
    this.progress.set(id, 0);
    if (!this.queue.enqueue(task)) {
      this.rejectTask(task);
      return false;
    }
    this.setStatus(task, 'queued');
    console.log(`[VoiceCache] Queued download: ${id} (priority: ${priority})`);
    this.pool.dispatch();
    return true;
  }

  private waitFor(id: string): Promise<FileResult> {
    return new Promise<FileResult>(resolve => {
      let set = this.waiters.get(id);
      if (!set) {
        set = new Set();
        this.waiters.set(id, set);
      }

      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          this.waiters.get(id)?.delete(waiter);
          console.log(`[VoiceCache] Download timeout: ${id}`);
          resolve({ ok: false, reason: 'timeout' });
          this.cancel(id);
        }, this.waitTimeoutMs),
      };
      set.add(waiter);
    });
  }

  private release(id: string, result: FileResult): void {
    const set = this.waiters.get(id);
    if (!set) return;
    this.waiters.delete(id);
    for (const waiter of set) {
      clearTimeout(waiter.timer);
      waiter.resolve(result);
    }
  }

  private setStatus(task: DownloadTask, status: DownloadStatus): void {
    task.status = status;
    this.statuses.set(task.id, status);
    this.channel.emit({ type: 'status', id: task.id, status });
  }

  /**
   * End a task. Waiters get the result before the terminal status is emitted,
   * so a listener that requests the id again starts a fresh task.
   */
  private finish(task: DownloadTask, status: DownloadStatus, result?: FileResult): void {
    if (this.tasks.get(task.id) === task) {
      this.tasks.delete(task.id);
    }
    if (status !== 'completed') {
      this.progress.set(task.id, 0);
    } else {
      this.progress.delete(task.id);
    }
    if (result) {
      this.release(task.id, result);
    }
    this.setStatus(task, status);
  }

  private commitEntry(id: string, url: string, localPath: string, sizeBytes: number): void {
    const now = this.index.now();
    this.index.commit({
      id,
      sourceUrl: url,
      localPath,
      sizeBytes,
      createdAt: now,
      lastAccessedAt: now,
    });
    enforceStorageLimits(this.index, this.limits, candidate => this.active.has(candidate));
  }

  // ============ WORKER CALLBACKS ============

  private handleStart(task: DownloadTask): void {
    this.progress.set(task.id, 0);
    this.setStatus(task, 'downloading');
  }

  private handleProgress(task: DownloadTask, bytesReceived: number, bytesTotal: number): void {
    const fraction = bytesTotal > 0 ? Math.min(bytesReceived / bytesTotal, 1) : 0;
    this.progress.set(task.id, fraction);
    this.channel.emit({ type: 'progress', id: task.id, bytesReceived, bytesTotal, fraction });
  }

  private handleComplete(task: DownloadTask, finalPath: string, sizeBytes: number): void {
    if (this.tasks.get(task.id) !== task) return;

    this.commitEntry(task.id, task.sourceUrl, finalPath, sizeBytes);
    this.finish(task, 'completed', { ok: true, path: finalPath });
  }

  private handleCancelled(task: DownloadTask): void {
    if (this.tasks.get(task.id) !== task) return;

    const reason: FailureReason = this.state === 'open' ? 'cancelled' : 'closed';
    this.finish(task, 'cancelled', { ok: false, reason });
  }

  private handleError(task: DownloadTask, error: unknown): void {
    if (this.tasks.get(task.id) !== task) return;

    task.attempts++;
    const message = errorMessage(error);

    if (this.state !== 'open') {
      this.finish(task, 'cancelled', { ok: false, reason: 'closed', error: message });
      return;
    }

    if (task.attempts < this.maxAttempts) {
      const delay = this.retries.delayFor(task.attempts);
      this.setStatus(task, 'retrying');
      console.log(`[VoiceCache] Retrying ${task.id} in ${delay / 1000}s (attempt ${task.attempts} failed)`);
      this.retries.schedule(task.id, delay, () => this.requeue(task));
      return;
    }

    console.error(`[VoiceCache] Max retries reached: ${task.id}`);
    this.finish(task, 'failed', { ok: false, reason: 'failed', error: message });
  }

  private requeue(task: DownloadTask): void {
    if (this.tasks.get(task.id) !== task || this.state !== 'open') return;

    if (!this.queue.enqueue(task)) {
      this.rejectTask(task);
      return;
    }
    this.setStatus(task, 'queued');
    this.pool.dispatch();
  }

  /**
   * End a task the queue refused: already cached, or the id still holds a transfer slot
   */
  private rejectTask(task: DownloadTask): void {
    const cachedPath = this.index.getPath(task.id);
    if (cachedPath) {
      this.finish(task, 'completed', { ok: true, path: cachedPath });
      return;
    }
    console.warn(`[VoiceCache] Could not queue ${task.id}`);
    this.finish(task, 'failed', { ok: false, reason: 'failed', error: 'Download could not be queued' });
  }
}
