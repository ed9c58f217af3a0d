/**
 * Releases a held lock. Calling it more than once has no further effect.
 */
export type Release = () => void;

/**
 * Raised when a lock is not handed over within the requested bound
 */
export class LockTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Lock not acquired within ${timeoutMs}ms`);
    this.name = 'LockTimeoutError';
  }
}

interface Waiter {
  grant: (release: Release) => void;
  timer?: NodeJS.Timeout;
}

/**
 * FIFO asynchronous mutex.
 * A released lock is handed directly to the oldest waiter, so a waiter can
 * never be overtaken by a later caller.
 */
export class Mutex {
  private locked = false;
  private waitingQueue: Waiter[] = [];

  /**
   * Acquire the lock, waiting if it is held
   * @param timeoutMs Reject with {@link LockTimeoutError} when not acquired in time
   * @returns The function that releases the lock
   */
  acquire(timeoutMs?: number): Promise<Release> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = { grant: resolve };

      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const index = this.waitingQueue.indexOf(waiter);
          if (index !== -1) {
            this.waitingQueue.splice(index, 1);
            reject(new LockTimeoutError(timeoutMs));
          }
        }, timeoutMs);
      }

      this.waitingQueue.push(waiter);
    });
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOver();
    };
  }

  private handOver(): void {
    const next = this.waitingQueue.shift();
    if (!next) {
      this.locked = false;
      return;
    }

    if (next.timer) {
      clearTimeout(next.timer);
    }
    next.grant(this.createRelease());
  }
}

interface KeyedEntry {
  mutex: Mutex;
  // holders plus waiters
  refs: number;
}

/**
 * One lazily created {@link Mutex} per key.
 * Entries are dropped as soon as nobody holds or waits for them.
 */
export class KeyedMutex<K = string> {
  private entries: Map<K, KeyedEntry> = new Map();

  async acquire(key: K, timeoutMs?: number): Promise<Release> {
    const entry = this.entries.get(key) ?? this.createEntry(key);
    entry.refs += 1;

    let release: Release;
    try {
      release = await entry.mutex.acquire(timeoutMs);
    } catch (error) {
      this.unref(key, entry);
      throw error;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
      this.unref(key, entry);
    };
  }

  private createEntry(key: K): KeyedEntry {
    const entry: KeyedEntry = { mutex: new Mutex(), refs: 0 };
    this.entries.set(key, entry);
    return entry;
  }

  private unref(key: K, entry: KeyedEntry): void {
    entry.refs -= 1;
    if (entry.refs === 0 && this.entries.get(key) === entry) {
      this.entries.delete(key);
    }
  }
}
