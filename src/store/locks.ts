import { metricsStore } from './metrics.js';

/**
 * KeyedLock serializes async critical sections per key using promise chains.
 *
 * Each acquire chains a new promise after the current tail for its key and waits
 * for the previous holder to release. Map reads and writes happen synchronously
 * between awaits, so two callers can never both observe an empty slot for the
 * same key. Keys are independent: holding `space:1` never delays `space:2`.
 */
export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  has(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }

  /**
   * Acquires the lock for `key`. The returned function must be called exactly once.
   */
  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key);
    if (previous) {
      metricsStore.incrementLockContention();
    }

    let release!: () => void;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = (previous ?? Promise.resolve()).then(() => held);
    this.tails.set(key, tail);

    await previous;
    metricsStore.incrementLockAcquisition();

    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
      // A newer waiter may have replaced the tail; only the last holder clears it.
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

export const spaceLocks = new KeyedLock();

export function spaceLockKey(spaceId: number): string {
  return `space:${spaceId}`;
}

export function withSpaceLock<T>(spaceId: number, fn: () => Promise<T>): Promise<T> {
  return spaceLocks.runExclusive(spaceLockKey(spaceId), fn);
}
