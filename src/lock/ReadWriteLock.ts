import { LockError } from "../errors";

export type LockMode = "read" | "write";

/** Releases a held lock; calling it more than once has no effect */
export type ReleaseFn = () => void;

interface Waiter {
  mode: LockMode;
  resolve: (release: ReleaseFn) => void;
  reject: (error: LockError) => void;
}

/**
 * Asynchronous reader/writer lock.
 *
 * Any number of readers may hold the lock together; a writer holds it alone.
 * Waiters are granted in arrival order, so a reader arriving behind a queued
 * writer waits for that writer.
 *
 * If a section run through {@link withWrite} throws, the lock is poisoned:
 * pending and future acquisitions reject with {@link LockError}.
 */
export class ReadWriteLock {
  private queue: Waiter[] = [];
  private activeReaders = 0;
  private writerActive = false;
  private poisoned = false;

  get isPoisoned(): boolean {
    return this.poisoned;
  }

  get readers(): number {
    return this.activeReaders;
  }

  get isWriteLocked(): boolean {
    return this.writerActive;
  }

  get pending(): number {
    return this.queue.length;
  }

  acquireRead(): Promise<ReleaseFn> {
    return this.acquire("read");
  }

  acquireWrite(): Promise<ReleaseFn> {
    return this.acquire("write");
  }

  /**
   * Run `fn` while holding shared access
   */
  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Run `fn` while holding exclusive access. A throwing `fn` poisons the lock.
   */
  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } catch (error) {
      this.poison();
      throw error;
    } finally {
      release();
    }
  }

  private acquire(mode: LockMode): Promise<ReleaseFn> {
    if (this.poisoned) {
      return Promise.reject(
        new LockError(`Failed to acquire ${mode} lock: lock is poisoned`),
      );
    }

    return new Promise<ReleaseFn>((resolve, reject) => {
      this.queue.push({ mode, resolve, reject });
      this.grant();
    });
  }

  private grant(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];

      if (next.mode === "write") {
        if (this.writerActive || this.activeReaders > 0) return;
        this.queue.shift();
        this.writerActive = true;
        next.resolve(this.createRelease("write"));
        return;
      }

      if (this.writerActive) return;
      this.queue.shift();
      this.activeReaders++;
      next.resolve(this.createRelease("read"));
    }
  }

  private createRelease(mode: LockMode): ReleaseFn {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      if (mode === "write") {
        this.writerActive = false;
      } else {
        this.activeReaders--;
      }
      this.grant();
    };
  }

  private poison(): void {
    this.poisoned = true;
    const waiters = this.queue;
    this.queue = [];
    for (const waiter of waiters) {
      waiter.reject(
        new LockError(
          `Failed to acquire ${waiter.mode} lock: lock is poisoned`,
        ),
      );
    }
  }
}
