// Per-key promise chains: work on one instrument runs strictly in order,
// work on different instruments never waits.

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /** Keys with queued or running work */
  get activeKeys(): number {
    return this.tails.size;
  }

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // drop the entry only if nobody queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
