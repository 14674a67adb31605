/**
 * Registry of AbortControllers per task id for cooperative cancellation.
 * One registry per session; cancel calls abort(), the task passes the signal down.
 */

export class AbortRegistry {
  private readonly controllers = new Map<string, AbortController>();

  /** Registering an id that is already running aborts the previous task. */
  register(taskId: string): AbortController {
    const existing = this.controllers.get(taskId);
    if (existing) {
      existing.abort();
    }
    const controller = new AbortController();
    this.controllers.set(taskId, controller);
    return controller;
  }

  get(taskId: string): AbortController | undefined {
    return this.controllers.get(taskId);
  }

  has(taskId: string): boolean {
    return this.controllers.has(taskId);
  }

  abort(taskId: string): boolean {
    const controller = this.controllers.get(taskId);
    if (controller) {
      controller.abort();
      return true;
    }
    return false;
  }

  /** Only removes the entry if it still belongs to `controller` (a re-register may have replaced it). */
  unregister(taskId: string, controller?: AbortController): void {
    if (controller && this.controllers.get(taskId) !== controller) return;
    this.controllers.delete(taskId);
  }

  abortAll(): number {
    const count = this.controllers.size;
    for (const controller of this.controllers.values()) {
      controller.abort();
    }
    this.controllers.clear();
    return count;
  }

  ids(): string[] {
    return [...this.controllers.keys()];
  }
}
