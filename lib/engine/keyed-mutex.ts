/**
 * Per-key async critical sections.
 *
 * Tasks for the same key run one after another in call order; tasks for
 * different keys never wait on each other. Each key holds only the tail of
 * its queue, and the entry is removed once the last queued task settles.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /** Number of keys with a running or queued task */
  get activeKeys(): number {
    return this.tails.size;
  }

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(() => task());
    const tail = run.then(noop, noop);
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

function noop(): void {}
