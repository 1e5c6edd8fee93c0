// lib/scopeLock.ts

/**
 * Keyed single-writer lock. Tasks sharing a key run one after another in
 * call order; tasks under different keys do not wait on each other.
 */
export class ScopeLock {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    // The chain only orders tasks; each caller still gets its own outcome from `run`
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  isBusy(key: string): boolean {
    return this.tails.has(key);
  }
}
