/**
 * Per-key mutual exclusion inside one process. Work for the same key runs one
 * at a time in arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Number of keys with queued or running work */
  get activeKeys(): number {
    return this.tails.size;
  }
}

const locksByStore = new WeakMap<object, KeyedMutex>();

/**
 * The mutex shared by every sync against the same store instance.
 */
export function lockFor(store: object): KeyedMutex {
  let lock = locksByStore.get(store);
  if (!lock) {
    lock = new KeyedMutex();
    locksByStore.set(store, lock);
  }
  return lock;
}
