/**
 * Async mutex keyed by id.
 *
 * Tasks for the same key run one after another in arrival order; tasks for
 * different keys run concurrently. A key's chain is dropped once its last
 * task settles.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  runExclusive<T>(key: string, execution: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tails.get(key) ?? Promise.resolve();
    this.tails.set(key, next);

    return previous.then(() =>
      execution().finally(() => {
        if (this.tails.get(key) === next) {
          this.tails.delete(key);
        }
        release();
      })
    );
  }

  /** Number of keys with a running or queued task */
  get activeKeys(): number {
    return this.tails.size;
  }
}
