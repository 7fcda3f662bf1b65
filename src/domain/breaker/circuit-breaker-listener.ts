import type { CircuitStateName } from './circuit-state';
import type { ExcludedError } from './error-classification';

/**
 * Read-only view of a breaker handed to listeners.
 */
export interface CircuitBreakerHandle {
  readonly name: string | undefined;
  readonly failMax: number;
  readonly resetTimeoutMs: number;
  readonly excludedErrors: readonly ExcludedError[];
  readonly listeners: readonly CircuitBreakerListener[];
}

export type GuardedOperation = (...args: never) => unknown;

/**
 * Observer hooks invoked synchronously by the breaker, in registration order.
 */
export interface CircuitBreakerListener {
  /** Called before the breaker runs an admitted operation. */
  beforeCall(breaker: CircuitBreakerHandle, operation: GuardedOperation, args: readonly unknown[]): void;

  /** Called when the operation succeeded, or failed with an excluded error. */
  success(breaker: CircuitBreakerHandle): void;

  /** Called when the operation failed with a qualifying error. */
  failure(breaker: CircuitBreakerHandle, error: unknown): void;

  stateChange(breaker: CircuitBreakerHandle, oldState: CircuitStateName, newState: CircuitStateName): void;
}

/**
 * Listener with no-op hooks; extend it and override only what you need.
 */
export class NoopCircuitBreakerListener implements CircuitBreakerListener {
  beforeCall(_breaker: CircuitBreakerHandle, _operation: GuardedOperation, _args: readonly unknown[]): void {}

  success(_breaker: CircuitBreakerHandle): void {}

  failure(_breaker: CircuitBreakerHandle, _error: unknown): void {}

  stateChange(_breaker: CircuitBreakerHandle, _oldState: CircuitStateName, _newState: CircuitStateName): void {}
}
