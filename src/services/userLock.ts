/**
 * Per-key async mutex. Callers for the same key run one at a time in
 * arrival order; different keys never wait on each other.
 */
export class UserLock {
  private locks = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<() => void> {
    while (this.locks.has(key)) {
      await this.locks.get(key);
    }

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = () => {
        if (this.locks.get(key) === held) {
          this.locks.delete(key);
        }
        resolve();
      };
    });
    this.locks.set(key, held);
    return release;
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  get size(): number {
    return this.locks.size;
  }
}
