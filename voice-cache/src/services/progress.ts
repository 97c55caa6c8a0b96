import { isTerminal, type ProgressEvent } from '../types/cache.js';
import { errorMessage } from '../utils/errors.js';

export type ProgressListener = (event: ProgressEvent) => void;

/**
 * Per-task subscriptions. Listeners notified of a terminal status are dropped.
 */
export class ProgressChannel {
  private readonly listeners = new Map<string, Set<ProgressListener>>();

  /**
   * Listen to an id until its task ends. An id with no task (a cache hit, or
   * nothing requested) never emits a terminal status, so the subscription lasts
   * until the returned unsubscribe is called or the channel is closed.
   */
  subscribe(id: string, listener: ProgressListener): () => void {
    let set = this.listeners.get(id);
    if (!set) {
      set = new Set();
      this.listeners.set(id, set);
    }
    set.add(listener);

    return () => {
      const current = this.listeners.get(id);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) {
        this.listeners.delete(id);
      }
    };
  }

  listenerCount(id: string): number {
    return this.listeners.get(id)?.size ?? 0;
  }

  emit(event: ProgressEvent): void {
    const set = this.listeners.get(event.id);
    if (!set) return;

    const notified = [...set];
    for (const listener of notified) {
      try {
        listener(event);
      } catch (error) {
        console.error(`[Progress] Listener failed for ${event.id}: ${errorMessage(error)}`);
      }
    }

    if (event.type === 'status' && isTerminal(event.status)) {
      // Listeners added while notifying belong to the next task
      for (const listener of notified) {
        set.delete(listener);
      }
      if (set.size === 0 && this.listeners.get(event.id) === set) {
        this.listeners.delete(event.id);
      }
    }
  }

  closeAll(): void {
    this.listeners.clear();
  }
}
