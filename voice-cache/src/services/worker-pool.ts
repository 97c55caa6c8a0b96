import * as fsPromises from 'fs/promises';
import * as path from 'path';
import type { ActiveTransferSet } from './active-transfers.js';
import type { CacheIndex } from './cache-index.js';
import type { DownloadQueue } from './download-queue.js';
import type { Fetcher } from './fetcher.js';
import type { DownloadTask } from '../types/cache.js';
import { TransferError, errorMessage } from '../utils/errors.js';
import { moveFileAsync, removeFileAsync, toFileStem } from '../utils/files.js';

export interface TransferCallbacks {
  onStart: (task: DownloadTask) => void;
  onProgress: (task: DownloadTask, bytesReceived: number, bytesTotal: number) => void;
  // Called while the id is still in the active set
  onComplete: (task: DownloadTask, finalPath: string, sizeBytes: number) => void;
  // Called after the partial file is gone and the slot is free
  onCancelled: (task: DownloadTask) => void;
  onError: (task: DownloadTask, error: unknown) => void;
}

export interface WorkerPoolOptions {
  tempDir: string;
  minFileBytes: number;
}

/**
 * Runs queued transfers, at most active.capacity at a time.
 * Dispatch is driven by enqueue and by workers freeing up.
 */
export class WorkerPool {
  private readonly running = new Set<Promise<void>>();
  private stopped = false;

  constructor(
    private readonly queue: DownloadQueue,
    private readonly active: ActiveTransferSet,
    private readonly index: CacheIndex,
    private readonly fetcher: Fetcher,
    private readonly options: WorkerPoolOptions,
    private readonly callbacks: TransferCallbacks,
  ) {}

  get runningCount(): number {
    return this.running.size;
  }

  partialPathFor(id: string): string {
    return path.join(this.options.tempDir, `${toFileStem(id)}.part`);
  }

  /**
   * Start as many queued transfers as there are free slots
   */
  dispatch(): void {
    if (this.stopped) return;

    let task = this.queue.dequeueNext();
    while (task) {
      this.start(task);
      task = this.queue.dequeueNext();
    }
  }

  stop(): void {
    this.stopped = true;
  }

  /**
   * Wait for every running transfer to settle
   */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.allSettled([...this.running]);
    }
  }

  private start(task: DownloadTask): void {
    const controller = this.active.add(task.id);
    task.status = 'downloading';
    this.callbacks.onStart(task);

    const run = this.runTransfer(task, controller)
      .catch((error: unknown) => {
        console.error(`[Transfer] Unexpected error for ${task.id}: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.running.delete(run);
      });
    this.running.add(run);
  }

  private async runTransfer(task: DownloadTask, controller: AbortController): Promise<void> {
    const { signal } = controller;
    const partialPath = this.partialPathFor(task.id);
    const finalPath = this.index.pathFor(task.id);

    console.log(`[Transfer] Downloading: ${task.id} (attempt ${task.attempts + 1})`);

    let sizeBytes: number;
    try {
      sizeBytes = await this.transfer(task, partialPath, finalPath, signal);
    } catch (error) {
      await removeFileAsync(partialPath, '[Transfer]');
      // Free the slot first: terminal listeners may request the id again
      this.active.delete(task.id, controller);
      try {
        if (signal.aborted) {
          console.log(`[Transfer] Download cancelled: ${task.id}`);
          this.callbacks.onCancelled(task);
        } else {
          console.error(`[Transfer] Download failed: ${task.id} - ${errorMessage(error)}`);
          this.callbacks.onError(task, error);
        }
      } finally {
        this.dispatch();
      }
      return;
    }

    console.log(`[Transfer] Downloaded: ${task.id} (${Math.floor(sizeBytes / 1024)}KB)`);
    try {
      this.callbacks.onComplete(task, finalPath, sizeBytes);
    } finally {
      this.active.delete(task.id, controller);
      this.dispatch();
    }
  }

  private async transfer(task: DownloadTask, partialPath: string, finalPath: string, signal: AbortSignal): Promise<number> {
    await this.fetcher.download(
      task.sourceUrl,
      partialPath,
      (bytesReceived, bytesTotal) => this.callbacks.onProgress(task, bytesReceived, bytesTotal),
      signal,
    );
    signal.throwIfAborted();

    const { size } = await fsPromises.stat(partialPath);
    if (size < this.options.minFileBytes) {
      throw new TransferError(`Downloaded file too small (${size} bytes)`);
    }
    signal.throwIfAborted();

    await moveFileAsync(partialPath, finalPath);
    return size;
  }
}
