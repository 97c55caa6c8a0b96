import type { KeyValueStore } from './kv-store.js';
import type { CacheEntry } from '../types/cache.js';

export const METADATA_KEY = 'cache_metadata';

interface StoredEntry {
  sourceUrl: string;
  localPath: string;
  sizeBytes: number;
  createdAt: number;
  lastAccessedAt: number;
}

function isStoredEntry(value: unknown): value is StoredEntry {
  if (typeof value !== 'object' || value === null) return false;
  const record = value as Record<string, unknown>;
  return typeof record.sourceUrl === 'string'
    && typeof record.localPath === 'string'
    && typeof record.sizeBytes === 'number'
    && typeof record.createdAt === 'number'
    && typeof record.lastAccessedAt === 'number';
}

// ==================== Cache metadata ====================

/**
 * Read the persisted metadata table. Records that don't parse are skipped.
 */
export function loadCacheEntries(store: KeyValueStore): CacheEntry[] {
  const blob = store.read(METADATA_KEY);
  if (!blob) return [];

  let data: unknown;
  try {
    data = JSON.parse(blob);
  } catch {
    console.warn('[DB] Cache metadata is not valid JSON, starting empty');
    return [];
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    console.warn('[DB] Cache metadata has unexpected shape, starting empty');
    return [];
  }

  const entries: CacheEntry[] = [];
  for (const [id, value] of Object.entries(data)) {
    if (!isStoredEntry(value)) {
      console.warn(`[DB] Skipping malformed cache record: ${id}`);
      continue;
    }
    entries.push(mapRecordToEntry(id, value));
  }
  return entries;
}

/**
 * Rewrite the whole metadata table
 */
export function saveCacheEntries(store: KeyValueStore, entries: Iterable<CacheEntry>): void {
  const data: Record<string, StoredEntry> = {};
  for (const entry of entries) {
    data[entry.id] = {
      sourceUrl: entry.sourceUrl,
      localPath: entry.localPath,
      sizeBytes: entry.sizeBytes,
      createdAt: entry.createdAt,
      lastAccessedAt: entry.lastAccessedAt,
    };
  }
  store.write(METADATA_KEY, JSON.stringify(data));
}

function mapRecordToEntry(id: string, record: StoredEntry): CacheEntry {
  return {
    id,
    sourceUrl: record.sourceUrl,
    localPath: record.localPath,
    sizeBytes: record.sizeBytes,
    createdAt: record.createdAt,
    lastAccessedAt: record.lastAccessedAt,
  };
}
