import type { CircuitStateName } from './circuit-state';

export type MaybePromise<T> = T | Promise<T>;

/**
 * Canonical {state, failure counter, opened-at} of one breaker identity.
 *
 * Methods may answer synchronously or with a promise. Implementations backed
 * by a remote store must never reject: reads fall back to a safe value and
 * writes are logged and dropped.
 */
export interface CircuitStorage {
  /** Human friendly backend name, used in logs. */
  readonly name: string;

  getState(): MaybePromise<CircuitStateName>;

  setState(state: CircuitStateName): MaybePromise<void>;

  getCounter(): MaybePromise<number>;

  /** Atomically increments the failure counter and returns the new value. */
  incrementCounter(): MaybePromise<number>;

  resetCounter(): MaybePromise<void>;

  getOpenedAt(): MaybePromise<Date | null>;

  /** Records `openedAt` only when it is newer than the stored value. */
  setOpenedAt(openedAt: Date): MaybePromise<void>;
}

/**
 * Storage that answers every operation synchronously. Required by the
 * blocking breaker.
 */
export interface SyncCircuitStorage extends CircuitStorage {
  getState(): CircuitStateName;
  setState(state: CircuitStateName): void;
  getCounter(): number;
  incrementCounter(): number;
  resetCounter(): void;
  getOpenedAt(): Date | null;
  setOpenedAt(openedAt: Date): void;
}
