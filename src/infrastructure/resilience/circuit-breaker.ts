import type { CircuitStateName, CircuitStorage } from '@/domain/breaker';
import { STATE_CLOSED, STATE_HALF_OPEN, STATE_OPEN } from '@/domain/breaker';
import { MemoryCircuitStorage } from '@/infrastructure/storage/memory-circuit.storage';
import type { BreakerOptions } from './base-circuit-breaker';
import { BaseCircuitBreaker } from './base-circuit-breaker';
import type { Flow } from './flow';
import { runAsync } from './flow';

export interface CircuitBreakerOptions extends BreakerOptions {
  /** Defaults to a fresh in-memory storage seeded closed. */
  storage?: CircuitStorage;
}

/**
 * Circuit Breaker pattern - prevents cascading failures.
 * Opens after `failMax` consecutive failures and fails fast until
 * `resetTimeoutMs` elapses, then lets one trial call decide.
 *
 * Works with any storage, including shared ones such as Redis.
 */
export class CircuitBreaker extends BaseCircuitBreaker {
  constructor(options: CircuitBreakerOptions = {}) {
    super(options.storage ?? new MemoryCircuitStorage(), options);
  }

  /** Runs `operation` with circuit breaker protection. */
  async call<A extends unknown[], R>(operation: (...args: A) => R, ...args: A): Promise<Awaited<R>> {
    const admitted = await this.exclusive(this.core.admit(operation, args));

    let result: Awaited<R>;
    try {
      result = await operation(...args);
    } catch (error) {
      return this.exclusive(this.core.settleFailure(admitted, error));
    }

    await this.exclusive(this.core.settleSuccess(admitted));
    return result;
  }

  /** Returns a function that routes every invocation of `operation` through {@link call}. */
  wrap<A extends unknown[], R>(operation: (...args: A) => R): (...args: A) => Promise<Awaited<R>> {
    return (...args: A) => this.call(operation, ...args);
  }

  /** Opens the circuit; calls fail fast until the reset timeout elapses. */
  open(): Promise<void> {
    return this.moveTo(STATE_OPEN);
  }

  /** Lets the next call through as a trial. */
  halfOpen(): Promise<void> {
    return this.moveTo(STATE_HALF_OPEN);
  }

  /** Closes the circuit and resets the failure counter. */
  close(): Promise<void> {
    return this.moveTo(STATE_CLOSED);
  }

  /** Canonical state as stored by the backend. */
  getCurrentState(): Promise<CircuitStateName> {
    return runAsync(this.core.canonicalState());
  }

  getFailCounter(): Promise<number> {
    return runAsync(this.core.failCounter());
  }

  /** Aligns the local state object with storage and returns its name. */
  reconcile(): Promise<CircuitStateName> {
    return this.exclusive(this.core.reconcile());
  }

  /**
   * Requested from inside a flow (a listener reacting to a transition), the
   * move waits until that flow has finished so it never interleaves with it.
   */
  private moveTo(target: CircuitStateName): Promise<void> {
    if (!this.lock.heldByCaller) {
      return this.exclusive(this.core.force(target));
    }
    return new Promise<void>((resolve, reject) => {
      this.lock.defer(() => runAsync(this.core.force(target)).then(resolve, reject));
    });
  }

  private exclusive<T>(flow: Flow<T>): Promise<T> {
    return this.lock.runExclusive(() => runAsync(flow));
  }
}
