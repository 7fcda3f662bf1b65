import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Mutual exclusion for one breaker instance. Ownership follows the async
 * context, so work started inside a critical section (a listener calling
 * `open()`) re-enters instead of waiting on itself.
 *
 * Work the holder defers runs after its outermost section and before the
 * lock passes to the next waiter.
 */
export class ReentrantLock {
  private readonly ownership = new AsyncLocalStorage<symbol>();
  private holder: symbol | undefined;
  private readonly waiters: Array<() => void> = [];
  private readonly deferred: Array<() => Promise<void>> = [];
  private readonly deferredSync: Array<() => void> = [];

  get locked(): boolean {
    return this.holder !== undefined;
  }

  /** True when the current async context owns the lock. */
  get heldByCaller(): boolean {
    return this.holder !== undefined && this.ownership.getStore() === this.holder;
  }

  /** Runs `fn` exclusively, waiting for the current holder if needed. */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    if (this.heldByCaller) {
      return fn();
    }

    const token = Symbol('lock-owner');
    if (this.holder === undefined) {
      this.holder = token;
    } else {
      await new Promise<void>((resolve) => {
        this.waiters.push(() => {
          this.holder = token;
          resolve();
        });
      });
    }

    try {
      return await this.ownership.run(token, fn);
    } finally {
      for (let task = this.deferred.shift(); task; task = this.deferred.shift()) {
        await this.ownership.run(token, task);
      }
      this.release();
    }
  }

  /** Runs `fn` exclusively without waiting; contention is a programming error. */
  runSync<T>(fn: () => T): T {
    if (this.heldByCaller) {
      return fn();
    }
    if (this.holder !== undefined) {
      throw new Error('Breaker lock is held by another caller; synchronous acquisition cannot wait');
    }

    const token = Symbol('lock-owner');
    this.holder = token;
    try {
      return this.ownership.run(token, fn);
    } finally {
      for (let task = this.deferredSync.shift(); task; task = this.deferredSync.shift()) {
        this.ownership.run(token, task);
      }
      this.release();
    }
  }

  /** Queues `task` behind the holder's section. Only the holder may defer. */
  defer(task: () => Promise<void>): void {
    this.assertHeld();
    this.deferred.push(task);
  }

  deferSync(task: () => void): void {
    this.assertHeld();
    this.deferredSync.push(task);
  }

  private assertHeld(): void {
    if (!this.heldByCaller) {
      throw new Error('Only the lock holder can defer work');
    }
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.holder = undefined;
    }
  }
}
