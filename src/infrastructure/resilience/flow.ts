import type { MaybePromise } from '@/domain/breaker';

/**
 * One storage interaction inside a flow. The driver decides whether to run it
 * synchronously or to await it.
 */
export class Step<T> {
  private settled: { value: T } | undefined;

  constructor(private readonly thunk: () => MaybePromise<T>) {}

  runSync(): void {
    const result = this.thunk();
    if (isPromiseLike(result)) {
      throw new TypeError('Storage answered asynchronously; use CircuitBreaker instead of SyncCircuitBreaker');
    }
    this.settled = { value: result };
  }

  /** Returns a promise only when the thunk did. */
  runAsync(): Promise<void> | undefined {
    const result = this.thunk();
    if (!isPromiseLike(result)) {
      this.settled = { value: result };
      return undefined;
    }
    return new Promise<T>((resolve) => resolve(result)).then((value) => {
      this.settled = { value };
    });
  }

  get value(): T {
    if (!this.settled) {
      throw new Error('Step read before it ran');
    }
    return this.settled.value;
  }
}

/**
 * Transition logic written once, driven either by {@link runSync} or
 * {@link runAsync}. Yields are the only suspension points.
 */
export type Flow<T> = Generator<Step<unknown>, T, void>;

export function* perform<T>(thunk: () => MaybePromise<T>): Flow<T> {
  const step = new Step(thunk);
  yield step;
  return step.value;
}

export function runSync<T>(flow: Flow<T>): T {
  let cursor = flow.next();
  while (!cursor.done) {
    try {
      cursor.value.runSync();
    } catch (error) {
      cursor = flow.throw(error);
      continue;
    }
    cursor = flow.next();
  }
  return cursor.value;
}

export async function runAsync<T>(flow: Flow<T>): Promise<T> {
  let cursor = flow.next();
  while (!cursor.done) {
    try {
      const pending = cursor.value.runAsync();
      if (pending) await pending;
    } catch (error) {
      cursor = flow.throw(error);
      continue;
    }
    cursor = flow.next();
  }
  return cursor.value;
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}
