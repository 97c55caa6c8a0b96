import type { CacheIndex } from './cache-index.js';

export interface EvictionLimits {
  maxCacheBytes: number;
  maxCachedFiles: number;
}

// Share of candidates removed per eviction run
export const EVICTION_FRACTION = 0.2;

export function isOverLimits(index: CacheIndex, limits: EvictionLimits): boolean {
  return index.totalBytes > limits.maxCacheBytes || index.count > limits.maxCachedFiles;
}

/**
 * Least recently used eviction.
 * Ids for which isProtected returns true (in-flight transfers) are never candidates.
 * Returns the evicted ids, oldest first.
 */
export function enforceStorageLimits(
  index: CacheIndex,
  limits: EvictionLimits,
  isProtected: (id: string) => boolean = () => false,
): string[] {
  if (!isOverLimits(index, limits)) {
    return [];
  }

  const sizeMB = index.totalBytes / (1024 * 1024);
  console.log(`[Eviction] Cache limit exceeded (${sizeMB.toFixed(1)}MB / ${index.count} files)`);

  const candidates = index.entries()
    .filter(entry => !isProtected(entry.id))
    .sort((a, b) => a.lastAccessedAt - b.lastAccessedAt);

  const toRemove = Math.ceil(candidates.length * EVICTION_FRACTION);
  console.log(`[Eviction] Evicting ${toRemove} oldest cache entries (LRU)`);

  const evicted: string[] = [];
  for (const entry of candidates.slice(0, toRemove)) {
    if (index.remove(entry.id)) {
      evicted.push(entry.id);
    }
  }
  return evicted;
}
