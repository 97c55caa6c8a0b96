import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import * as fs from 'fs';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { TransferError, errorCode, errorMessage } from '../utils/errors.js';

export type ProgressCallback = (bytesReceived: number, bytesTotal: number) => void;

/**
 * Network fetch capability: stream a URL to a local path.
 * Rejects on failure; aborting the signal cancels the transfer.
 */
export interface Fetcher {
  download(url: string, destPath: string, onProgress: ProgressCallback, signal: AbortSignal): Promise<void>;
}

export interface AxiosFetcherOptions {
  timeoutMs?: number;
  client?: AxiosInstance;
}

function isReadable(value: unknown): value is Readable {
  return typeof value === 'object' && value !== null && 'pipe' in value && typeof value.pipe === 'function';
}

export class AxiosFetcher implements Fetcher {
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(options: AxiosFetcherOptions = {}) {
    this.client = options.client ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  async download(url: string, destPath: string, onProgress: ProgressCallback, signal: AbortSignal): Promise<void> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(url, {
        responseType: 'stream',
        signal,
        timeout: this.timeoutMs,
        maxRedirects: 5,
      });
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        throw new TransferError(`HTTP ${error.response.status} for ${url}`, { status: error.response.status, cause: error });
      }
      throw error;
    }

    const body = response.data;
    if (!isReadable(body)) {
      throw new TransferError(`No response body for ${url}`);
    }

    const lengthHeader = response.headers['content-length'];
    const parsedTotal = typeof lengthHeader === 'string' || typeof lengthHeader === 'number'
      ? Number(lengthHeader)
      : 0;
    const total = Number.isFinite(parsedTotal) ? parsedTotal : 0;
    let received = 0;

    body.on('data', (chunk: Buffer) => {
      received += chunk.length;
      onProgress(received, total);
    });

    try {
      await pipeline(body, fs.createWriteStream(destPath), { signal });
    } catch (error) {
      if (signal.aborted) throw error;
      throw new TransferError(`Write failed for ${url}: ${errorMessage(error)}`, { code: errorCode(error), cause: error });
    }
  }
}
