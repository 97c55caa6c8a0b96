import * as fs from 'fs';
import * as path from 'path';
import type { KeyValueStore } from '../db/kv-store.js';
import { loadCacheEntries, saveCacheEntries } from '../db/repository.js';
import type { CacheEntry } from '../types/cache.js';
import { errorMessage } from '../utils/errors.js';
import { removeFile, toFileStem } from '../utils/files.js';

export interface CacheIndexOptions {
  cacheDir: string;
  fileExtension: string;
  clock?: () => number;
}

export interface ReconcileReport {
  loaded: number;
  droppedEntries: number;
  orphanFiles: number;
}

/**
 * In-memory mirror of the persisted metadata table.
 * Every mutation is written through to the store.
 */
export class CacheIndex {
  private readonly entriesById = new Map<string, CacheEntry>();
  private readonly clock: () => number;
  private bytes = 0;

  constructor(
    private readonly store: KeyValueStore,
    private readonly options: CacheIndexOptions,
  ) {
    this.clock = options.clock ?? Date.now;
  }

  get cacheDir(): string {
    return this.options.cacheDir;
  }

  get count(): number {
    return this.entriesById.size;
  }

  get totalBytes(): number {
    return this.bytes;
  }

  now(): number {
    return this.clock();
  }

  /**
   * Final location of the file for an id
   */
  pathFor(id: string): string {
    return path.join(this.options.cacheDir, `${toFileStem(id)}${this.options.fileExtension}`);
  }

  /**
   * Load the persisted table and repair it against the cache directory
   */
  load(): ReconcileReport {
    this.entriesById.clear();
    this.bytes = 0;

    const loaded = loadCacheEntries(this.store);
    for (const entry of loaded) {
      this.entriesById.set(entry.id, entry);
      this.bytes += entry.sizeBytes;
    }
    console.log(`[CacheIndex] Loaded ${loaded.length} cache entries`);

    const report = this.reconcile();
    return { loaded: loaded.length, ...report };
  }

  private reconcile(): Omit<ReconcileReport, 'loaded'> {
    // Entries whose file is gone
    let droppedEntries = 0;
    for (const entry of [...this.entriesById.values()]) {
      if (!fs.existsSync(entry.localPath)) {
        this.entriesById.delete(entry.id);
        this.bytes -= entry.sizeBytes;
        droppedEntries++;
        console.log(`[CacheIndex] Dropped entry without file: ${entry.id}`);
      }
    }

    // Files nobody points at
    let orphanFiles = 0;
    const known = new Set([...this.entriesById.values()].map(entry => path.resolve(entry.localPath)));
    for (const dirent of fs.readdirSync(this.options.cacheDir, { withFileTypes: true })) {
      if (!dirent.isFile()) continue;
      const filePath = path.join(this.options.cacheDir, dirent.name);
      if (known.has(path.resolve(filePath))) continue;
      if (removeFile(filePath, '[CacheIndex]')) {
        orphanFiles++;
      }
    }

    if (droppedEntries > 0) {
      this.persist();
    }
    if (droppedEntries > 0 || orphanFiles > 0) {
      console.log(`[CacheIndex] Reconciled: ${droppedEntries} dangling entries, ${orphanFiles} orphaned files`);
    }
    return { droppedEntries, orphanFiles };
  }

  isCached(id: string): boolean {
    return this.entriesById.has(id);
  }

  getPath(id: string): string | null {
    return this.entriesById.get(id)?.localPath ?? null;
  }

  get(id: string): CacheEntry | undefined {
    return this.entriesById.get(id);
  }

  entries(): CacheEntry[] {
    return [...this.entriesById.values()];
  }

  commit(entry: CacheEntry): void {
    const previous = this.entriesById.get(entry.id);
    if (previous) {
      this.bytes -= previous.sizeBytes;
    }
    this.entriesById.set(entry.id, entry);
    this.bytes += entry.sizeBytes;
    this.persist();
  }

  /**
   * Update last access time (LRU)
   */
  touch(id: string): void {
    const entry = this.entriesById.get(id);
    if (!entry) return;
    entry.lastAccessedAt = this.clock();
    this.persist();
  }

  /**
   * Delete the backing file, then the entry. Unknown ids are ignored.
   */
  remove(id: string): boolean {
    const entry = this.entriesById.get(id);
    if (!entry) return false;

    removeFile(entry.localPath, '[CacheIndex]');
    this.entriesById.delete(id);
    this.bytes -= entry.sizeBytes;
    this.persist();

    console.log(`[CacheIndex] Removed cache entry: ${id}`);
    return true;
  }

  /**
   * Remove every entry and every file in the cache directory
   */
  clear(): void {
    for (const entry of this.entriesById.values()) {
      removeFile(entry.localPath, '[CacheIndex]');
    }
    this.entriesById.clear();
    this.bytes = 0;

    if (fs.existsSync(this.options.cacheDir)) {
      for (const dirent of fs.readdirSync(this.options.cacheDir, { withFileTypes: true })) {
        if (dirent.isFile()) {
          removeFile(path.join(this.options.cacheDir, dirent.name), '[CacheIndex]');
        }
      }
    }

    try {
      this.store.erase();
    } catch (error) {
      console.warn(`[CacheIndex] Failed to erase metadata: ${errorMessage(error)}`);
    }
  }

  private persist(): void {
    try {
      saveCacheEntries(this.store, this.entriesById.values());
    } catch (error) {
      console.warn(`[CacheIndex] Failed to save cache metadata: ${errorMessage(error)}`);
    }
  }
}
