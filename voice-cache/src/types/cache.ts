export type DownloadPriority = 'high' | 'normal' | 'low';

export type DownloadStatus =
  | 'queued'      // Waiting for a free worker
  | 'downloading' // Transfer in flight
  | 'retrying'    // Waiting for backoff to elapse
  | 'completed'   // File committed to the cache
  | 'failed'      // Retries exhausted
  | 'cancelled';  // Cancelled by caller, timeout or shutdown

export const TERMINAL_STATUSES: readonly DownloadStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminal(status: DownloadStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export interface CacheEntry {
  id: string;
  sourceUrl: string;
  localPath: string;
  sizeBytes: number;
  createdAt: number;      // epoch ms
  lastAccessedAt: number; // epoch ms
}

export interface DownloadTask {
  id: string;
  sourceUrl: string;
  priority: DownloadPriority;
  attempts: number;
  status: DownloadStatus;
}

export type FailureReason = 'failed' | 'cancelled' | 'timeout' | 'closed';

export type FileResult =
  | { ok: true; path: string }
  | { ok: false; reason: FailureReason; error?: string };

export interface PrefetchRequest {
  id: string;
  url: string;
  priority?: DownloadPriority;
}

export type ProgressEvent =
  | { type: 'status'; id: string; status: DownloadStatus }
  | { type: 'progress'; id: string; bytesReceived: number; bytesTotal: number; fraction: number };

export interface CacheStats {
  files: number;
  sizeBytes: number;
  sizeMB: number;
  queued: number;
  active: number;
  retrying: number;
}
