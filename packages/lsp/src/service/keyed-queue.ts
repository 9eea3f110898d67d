/**
 * Runs operations one at a time per key, in submission order. Different keys
 * never wait on each other.
 */
export class KeyedQueue<K> {
  private readonly tails = new Map<K, Promise<void>>();

  public async run<T>(key: K, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release = (): void => {};
    const next = new Promise<void>((resolveRelease) => {
      release = resolveRelease;
    });

    const tail = previous.then(() => next);
    this.tails.set(key, tail);

    await previous;
    try {
      return await operation();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
