/**
 * In-flight transfers and their cancellation handles
 */
export class ActiveTransferSet {
  private readonly controllers = new Map<string, AbortController>();

  constructor(readonly capacity: number) {
    if (capacity < 1) {
      throw new Error('ActiveTransferSet capacity must be at least 1');
    }
  }

  get size(): number {
    return this.controllers.size;
  }

  hasCapacity(): boolean {
    return this.controllers.size < this.capacity;
  }

  has(id: string): boolean {
    return this.controllers.has(id);
  }

  ids(): string[] {
    return [...this.controllers.keys()];
  }

  add(id: string): AbortController {
    if (this.controllers.has(id)) {
      throw new Error(`Transfer already active: ${id}`);
    }
    if (!this.hasCapacity()) {
      throw new Error('No free transfer slot');
    }
    const controller = new AbortController();
    this.controllers.set(id, controller);
    return controller;
  }

  /**
   * Drop an id. With a controller, only when it still owns the slot.
   */
  delete(id: string, controller?: AbortController): void {
    if (controller && this.controllers.get(id) !== controller) return;
    this.controllers.delete(id);
  }

  abort(id: string, reason = 'Cancelled'): boolean {
    const controller = this.controllers.get(id);
    if (!controller) return false;
    if (!controller.signal.aborted) {
      controller.abort(reason);
    }
    return true;
  }

  abortAll(reason = 'Shutting down'): void {
    for (const controller of this.controllers.values()) {
      if (!controller.signal.aborted) {
        controller.abort(reason);
      }
    }
  }
}
