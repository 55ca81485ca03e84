/**
 * Per-key async mutex.
 *
 * Callers holding different keys run concurrently; callers on the same key
 * queue in FIFO order. A key's entry is dropped once its last holder
 * releases. Not reentrant: locking a key you already hold deadlocks.
 */

export type ReleaseFn = () => void;

interface KeyState {
  locked: boolean;
  waiters: Array<() => void>;
}

export class KeyedMutex {
  private readonly keys = new Map<string, KeyState>();

  acquire(key: string): Promise<ReleaseFn> {
    const state = this.keys.get(key);
    if (!state) {
      this.keys.set(key, { locked: true, waiters: [] });
      return Promise.resolve(this.createReleaseFn(key));
    }
    return new Promise<ReleaseFn>((resolve) => {
      state.waiters.push(() => {
        state.locked = true;
        resolve(this.createReleaseFn(key));
      });
    });
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.keys.get(key)?.locked ?? false;
  }

  /** Number of keys currently held or waited on. */
  get activeKeys(): number {
    return this.keys.size;
  }

  private createReleaseFn(key: string): ReleaseFn {
    let released = false;
    return (): void => {
      if (released) return;
      released = true;

      const state = this.keys.get(key);
      if (!state) return;
      state.locked = false;
      const next = state.waiters.shift();
      if (next) {
        queueMicrotask(next);
      } else {
        this.keys.delete(key);
      }
    };
  }
}
