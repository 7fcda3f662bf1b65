import type { CircuitStateName } from '@/domain/breaker';
import { STATE_CLOSED, STATE_HALF_OPEN, STATE_OPEN } from '@/domain/breaker';
import type { BreakerCore } from './breaker-core';
import type { Flow } from './flow';
import { perform } from './flow';

/**
 * Per-state gating and transition triggers. A state object lives until the
 * breaker moves to another state; outcomes of calls it admitted are ignored
 * once it has been replaced.
 */
export abstract class CircuitState {
  abstract readonly name: CircuitStateName;

  constructor(protected readonly core: BreakerCore) {}

  /** Entry side effects, run whenever this state object is built. */
  *enter(): Flow<void> {}

  /** Lets the call through (returning the state that owns it) or throws CircuitBreakerError. */
  abstract admit(): Flow<CircuitState>;

  *onSuccess(): Flow<void> {}

  /** The admitted call failed with an excluded error. */
  *onInconclusive(): Flow<void> {}

  *onFailure(_error: unknown): Flow<void> {}
}

/**
 * Normal operation: calls run, qualifying failures are counted and the
 * circuit opens once the counter reaches `failMax`.
 */
export class ClosedCircuitState extends CircuitState {
  readonly name = STATE_CLOSED;

  *enter(): Flow<void> {
    yield* perform(() => this.core.storage.resetCounter());
  }

  *admit(): Flow<CircuitState> {
    return this;
  }

  *onFailure(error: unknown): Flow<void> {
    const failures = yield* perform(() => this.core.storage.incrementCounter());
    if (failures >= this.core.settings.failMax) {
      yield* this.core.transition(STATE_OPEN);
      throw this.core.openError('Failures threshold reached, circuit breaker opened', STATE_OPEN, error);
    }
  }
}

/**
 * Calls fail fast until `resetTimeoutMs` has elapsed since `openedAt`; the
 * first call after that moves the breaker to half-open and becomes its trial.
 */
export class OpenCircuitState extends CircuitState {
  readonly name = STATE_OPEN;

  *enter(): Flow<void> {
    const openedAt = new Date(this.core.now());
    yield* perform(() => this.core.storage.setOpenedAt(openedAt));
  }

  *admit(): Flow<CircuitState> {
    const openedAt = yield* perform(() => this.core.storage.getOpenedAt());

    if (openedAt && this.core.now() < openedAt.getTime() + this.core.settings.resetTimeoutMs) {
      if (this.core.settings.countRejectedCalls) {
        yield* perform(() => this.core.storage.incrementCounter());
      }
      throw this.core.openError('Timeout not elapsed yet, circuit breaker still open', STATE_OPEN);
    }

    const probation = yield* this.core.transition(STATE_HALF_OPEN);
    return yield* probation.admit();
  }
}

/**
 * Probation: exactly one trial call runs. Success closes the circuit, a
 * qualifying failure opens it again.
 */
export class HalfOpenCircuitState extends CircuitState {
  readonly name = STATE_HALF_OPEN;
  private trialInFlight = false;

  *admit(): Flow<CircuitState> {
    if (this.trialInFlight) {
      throw this.core.openError('Trial call in progress, circuit breaker half-open', STATE_HALF_OPEN);
    }
    this.trialInFlight = true;
    return this;
  }

  *onSuccess(): Flow<void> {
    yield* this.core.transition(STATE_CLOSED);
  }

  *onInconclusive(): Flow<void> {
    this.trialInFlight = false;
  }

  *onFailure(error: unknown): Flow<void> {
    yield* this.core.transition(STATE_OPEN);
    throw this.core.openError('Trial call failed, circuit breaker opened', STATE_OPEN, error);
  }
}
