import { config as dotenvConfig } from 'dotenv';
import * as path from 'path';

dotenvConfig();

export interface Config {
  port: number;
  host: string;
  dataPath: string;
  cachePath: string;
  recordingsPath: string;
  maxCacheBytes: number;
  maxCachedFiles: number;
  maxConcurrentDownloads: number;
  maxAttempts: number;
  retryDelaysMs: number[];
  waitTimeoutMs: number;
  requestTimeoutMs: number;
  fileExtension: string;
  minFileBytes: number;
}

const DEFAULT_RETRY_DELAYS_MS = [2000, 5000, 10000];

let config: Config | null = null;

function parseIntOr(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Parse a comma separated list of delays like "2000,5000,10000"
 */
export function parseDelays(value: string | undefined): number[] {
  if (!value) return [...DEFAULT_RETRY_DELAYS_MS];
  const delays = value
    .split(',')
    .map(part => parseInt(part.trim(), 10))
    .filter(delay => Number.isFinite(delay) && delay >= 0);
  return delays.length > 0 ? delays : [...DEFAULT_RETRY_DELAYS_MS];
}

export function getConfig(): Config {
  if (!config) {
    const dataPath = process.env.DATA_PATH || '/data';
    const extension = process.env.CACHE_FILE_EXTENSION || '.m4a';

    config = {
      port: parseIntOr(process.env.PORT, 9120),
      host: process.env.HOST || '0.0.0.0',
      dataPath,
      cachePath: process.env.CACHE_PATH || path.join(dataPath, 'voice_cache'),
      recordingsPath: process.env.RECORDINGS_PATH || path.join(dataPath, 'recordings'),
      maxCacheBytes: parseIntOr(process.env.MAX_CACHE_SIZE_MB, 100) * 1024 * 1024,
      maxCachedFiles: parseIntOr(process.env.MAX_CACHED_FILES, 50),
      maxConcurrentDownloads: parseIntOr(process.env.MAX_CONCURRENT_DOWNLOADS, 3),
      maxAttempts: parseIntOr(process.env.MAX_DOWNLOAD_ATTEMPTS, 3),
      retryDelaysMs: parseDelays(process.env.RETRY_DELAYS_MS),
      waitTimeoutMs: parseIntOr(process.env.WAIT_TIMEOUT_MS, 2 * 60 * 1000),
      requestTimeoutMs: parseIntOr(process.env.REQUEST_TIMEOUT_MS, 30000),
      fileExtension: extension.startsWith('.') ? extension : `.${extension}`,
      minFileBytes: parseIntOr(process.env.MIN_FILE_BYTES, 1),
    };
  }
  return config;
}

export function reloadConfig(): void {
  config = null;
  getConfig();
}
