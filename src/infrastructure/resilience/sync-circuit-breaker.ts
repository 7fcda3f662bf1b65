import type { CircuitStateName, SyncCircuitStorage } from '@/domain/breaker';
import { STATE_CLOSED, STATE_HALF_OPEN, STATE_OPEN } from '@/domain/breaker';
import { MemoryCircuitStorage } from '@/infrastructure/storage/memory-circuit.storage';
import type { BreakerOptions } from './base-circuit-breaker';
import { BaseCircuitBreaker } from './base-circuit-breaker';
import type { Flow } from './flow';
import { runSync } from './flow';

export interface SyncCircuitBreakerOptions extends BreakerOptions {
  storage?: SyncCircuitStorage;
}

/**
 * Blocking counterpart of {@link CircuitBreaker} for synchronous operations
 * over synchronous storage. The operation's return value is passed through
 * as is, so promise-returning operations belong on `CircuitBreaker`.
 */
export class SyncCircuitBreaker extends BaseCircuitBreaker {
  constructor(options: SyncCircuitBreakerOptions = {}) {
    super(options.storage ?? new MemoryCircuitStorage(), options);
  }

  call<A extends unknown[], R>(operation: (...args: A) => R, ...args: A): R {
    const admitted = this.exclusive(this.core.admit(operation, args));

    let result: R;
    try {
      result = operation(...args);
    } catch (error) {
      return this.exclusive(this.core.settleFailure(admitted, error));
    }

    this.exclusive(this.core.settleSuccess(admitted));
    return result;
  }

  wrap<A extends unknown[], R>(operation: (...args: A) => R): (...args: A) => R {
    return (...args: A) => this.call(operation, ...args);
  }

  open(): void {
    this.moveTo(STATE_OPEN);
  }

  halfOpen(): void {
    this.moveTo(STATE_HALF_OPEN);
  }

  close(): void {
    this.moveTo(STATE_CLOSED);
  }

  get currentState(): CircuitStateName {
    return runSync(this.core.canonicalState());
  }

  get failCounter(): number {
    return runSync(this.core.failCounter());
  }

  reconcile(): CircuitStateName {
    return this.exclusive(this.core.reconcile());
  }

  /** From inside a flow the move runs once that flow has finished; failures are then logged. */
  private moveTo(target: CircuitStateName): void {
    if (!this.lock.heldByCaller) {
      this.exclusive(this.core.force(target));
      return;
    }
    this.lock.deferSync(() => {
      try {
        runSync(this.core.force(target));
      } catch (error) {
        this.core.reportDeferredFailure(target, error);
      }
    });
  }

  private exclusive<T>(flow: Flow<T>): T {
    return this.lock.runSync(() => runSync(flow));
  }
}
