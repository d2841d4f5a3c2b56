type Release = () => void;

/**
 * In-process mutex keyed by string. Holders of the same key run one after
 * another in arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: Release = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }

  /**
   * Runs `task` while holding every key. Keys are deduplicated and taken in
   * sorted order so two multi-key holders cannot deadlock.
   */
  async runExclusive<T>(keys: string | readonly string[], task: () => T | Promise<T>): Promise<T> {
    const ordered = [...new Set(typeof keys === 'string' ? [keys] : keys)].sort();
    const releases: Release[] = [];
    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await task();
    } finally {
      for (const release of releases.reverse()) release();
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}

export const slotLockKey = (date: string, time: string) => `slot:${date}:${time}`;
export const reservationLockKey = (id: string) => `reservation:${id}`;
export const sessionLockKey = (sessionId: string) => `session:${sessionId}`;
