/**
 * Pending re-enqueues keyed by task id. A cancelled retry never fires.
 */
export class RetryScheduler {
  private readonly pending = new Map<string, NodeJS.Timeout>();

  constructor(private readonly delaysMs: readonly number[]) {
    if (delaysMs.length === 0) {
      throw new Error('RetryScheduler needs at least one delay');
    }
  }

  /**
   * Delay before the next try, by number of failed attempts so far (1-based).
   * Positional in the table; the last value is reused past its end.
   */
  delayFor(attempts: number): number {
    const index = Math.min(Math.max(attempts - 1, 0), this.delaysMs.length - 1);
    return this.delaysMs[index];
  }

  schedule(id: string, delayMs: number, fire: () => void): void {
    this.cancel(id);
    const timer = setTimeout(() => {
      this.pending.delete(id);
      fire();
    }, delayMs);
    this.pending.set(id, timer);
  }

  has(id: string): boolean {
    return this.pending.has(id);
  }

  get size(): number {
    return this.pending.size;
  }

  cancel(id: string): boolean {
    const timer = this.pending.get(id);
    if (!timer) return false;
    clearTimeout(timer);
    this.pending.delete(id);
    return true;
  }

  cancelAll(): void {
    for (const timer of this.pending.values()) {
      clearTimeout(timer);
    }
    this.pending.clear();
  }
}
