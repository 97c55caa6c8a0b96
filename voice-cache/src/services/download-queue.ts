import type { ActiveTransferSet } from './active-transfers.js';
import type { CacheIndex } from './cache-index.js';
import type { DownloadPriority, DownloadTask } from '../types/cache.js';

const PRIORITY_RANK: Record<DownloadPriority, number> = {
  high: 0,
  normal: 1,
  low: 2,
};

/**
 * Pending transfers ordered by priority, FIFO within a priority.
 * Ordering is only decided at dequeue time; running transfers are never preempted.
 */
export class DownloadQueue {
  private readonly tasks: DownloadTask[] = [];

  constructor(
    private readonly index: CacheIndex,
    private readonly active: ActiveTransferSet,
  ) {}

  get size(): number {
    return this.tasks.length;
  }

  has(id: string): boolean {
    return this.tasks.some(task => task.id === id);
  }

  /**
   * Insert a task. Returns false (no-op) when the id is cached, queued or active.
   */
  enqueue(task: DownloadTask): boolean {
    if (this.index.isCached(task.id) || this.active.has(task.id) || this.has(task.id)) {
      return false;
    }

    const rank = PRIORITY_RANK[task.priority];
    // After every task of the same or higher priority
    let position = this.tasks.findIndex(queued => PRIORITY_RANK[queued.priority] > rank);
    if (position === -1) {
      position = this.tasks.length;
    }

    task.status = 'queued';
    this.tasks.splice(position, 0, task);
    return true;
  }

  /**
   * Head of the queue, only when a transfer slot is free
   */
  dequeueNext(): DownloadTask | null {
    if (!this.active.hasCapacity()) return null;
    return this.tasks.shift() ?? null;
  }

  remove(id: string): DownloadTask | null {
    const position = this.tasks.findIndex(task => task.id === id);
    if (position === -1) return null;
    const [task] = this.tasks.splice(position, 1);
    return task;
  }

  ids(): string[] {
    return this.tasks.map(task => task.id);
  }

  clear(): DownloadTask[] {
    return this.tasks.splice(0, this.tasks.length);
  }
}
