/**
 * Scope Executor
 *
 * Runs work for the same scope one job at a time, in submission
 * order. Jobs for different scopes do not wait on each other.
 *
 * @module service/scope-executor
 */

export class ScopeExecutor {
  private locks = new Map<string, Promise<void>>();

  async run<T>(scopeId: string, work: () => T | Promise<T>): Promise<T> {
    // A failed job has already rejected towards its own caller
    const previous = (this.locks.get(scopeId) ?? Promise.resolve()).catch(() => undefined);
    let release = (): void => undefined;
    const gate = new Promise<void>(resolve => {
      release = () => resolve();
    });
    const chain = previous.then(() => gate);
    this.locks.set(scopeId, chain);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.locks.get(scopeId) === chain) {
        this.locks.delete(scopeId);
      }
    }
  }

  /** Number of scopes with queued or running work */
  get activeScopes(): number {
    return this.locks.size;
  }
}
