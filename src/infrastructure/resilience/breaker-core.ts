import type {
  CircuitBreakerHandle,
  CircuitBreakerListener,
  CircuitStateName,
  CircuitStorage,
  ExcludedError,
  GuardedOperation,
} from '@/domain/breaker';
import { CircuitBreakerError, STATE_CLOSED, STATE_HALF_OPEN, STATE_OPEN, isExcludedError } from '@/domain/breaker';
import type { ILogger } from '@/domain/services';
import { CircuitState, ClosedCircuitState, HalfOpenCircuitState, OpenCircuitState } from './circuit-states';
import type { Flow } from './flow';
import { perform } from './flow';

/** Mutable breaker configuration shared by the core and its adapter. */
export interface BreakerSettings {
  name: string | undefined;
  failMax: number;
  resetTimeoutMs: number;
  countRejectedCalls: boolean;
  excludedErrors: ExcludedError[];
  listeners: CircuitBreakerListener[];
}

/**
 * The state machine behind both breaker adapters.
 *
 * Every public flow starts by reconciling the cached state object with the
 * canonical state in storage; that is how breakers in separate processes
 * sharing one backend converge. Flows never run the guarded operation: the
 * adapters call {@link admit}, run the operation outside the lock, then
 * settle the outcome.
 */
export class BreakerCore {
  private current: CircuitState | undefined;

  constructor(
    readonly storage: CircuitStorage,
    readonly settings: BreakerSettings,
    private readonly handle: CircuitBreakerHandle,
    private readonly logger: ILogger,
    private readonly clock: () => number = () => Date.now(),
  ) {}

  now(): number {
    return this.clock();
  }

  *canonicalState(): Flow<CircuitStateName> {
    return yield* perform(() => this.storage.getState());
  }

  *failCounter(): Flow<number> {
    return yield* perform(() => this.storage.getCounter());
  }

  /** Compares cached and canonical state, rebuilding the cached state on mismatch. */
  *resolveState(): Flow<CircuitState> {
    const canonical = yield* this.canonicalState();
    const cached = this.current;
    if (cached && cached.name === canonical) {
      return cached;
    }

    const rebuilt = this.createState(canonical);
    this.current = rebuilt;
    yield* rebuilt.enter();

    if (cached) {
      this.logger.debug('Breaker state reconciled with storage', {
        breaker: this.settings.name,
        from: cached.name,
        to: canonical,
      });
      this.notifyStateChange(cached.name, canonical);
    }
    return rebuilt;
  }

  *reconcile(): Flow<CircuitStateName> {
    const state = yield* this.resolveState();
    return state.name;
  }

  /** Moves the breaker to `target`, persisting it and running its entry side effects. */
  *transition(target: CircuitStateName): Flow<CircuitState> {
    const previous = yield* this.resolveState();

    yield* perform(() => this.storage.setState(target));
    const next = this.createState(target);
    this.current = next;
    yield* next.enter();

    if (previous.name !== target) {
      this.notifyStateChange(previous.name, target);
    }
    return next;
  }

  *force(target: CircuitStateName): Flow<void> {
    yield* this.transition(target);
  }

  *admit(operation: GuardedOperation, args: readonly unknown[]): Flow<CircuitState> {
    const state = yield* this.resolveState();
    const admitted = yield* state.admit();
    this.dispatch('beforeCall', (listener) => listener.beforeCall(this.handle, operation, args));
    return admitted;
  }

  *settleSuccess(admitted: CircuitState): Flow<void> {
    const state = yield* this.resolveState();
    if (state === admitted) {
      yield* perform(() => this.storage.resetCounter());
      yield* state.onSuccess();
    }
    this.dispatch('success', (listener) => listener.success(this.handle));
  }

  *settleFailure(admitted: CircuitState, error: unknown): Flow<never> {
    const state = yield* this.resolveState();

    if (!this.isSystemError(error)) {
      if (state === admitted) {
        yield* perform(() => this.storage.resetCounter());
        yield* state.onInconclusive();
      }
      this.dispatch('success', (listener) => listener.success(this.handle));
      throw error;
    }

    this.dispatch('failure', (listener) => listener.failure(this.handle, error));
    if (state === admitted) {
      yield* state.onFailure(error);
    }
    throw error;
  }

  reportDeferredFailure(target: CircuitStateName, error: unknown): void {
    this.logger.error('Deferred breaker transition failed', {
      breaker: this.settings.name,
      target,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  /** Business errors (excluded classifications) do not count against the dependency. */
  isSystemError(error: unknown): boolean {
    return !isExcludedError(error, this.settings.excludedErrors);
  }

  openError(message: string, state: CircuitStateName, cause?: unknown): CircuitBreakerError {
    return new CircuitBreakerError(message, this.settings.name, state, cause === undefined ? undefined : { cause });
  }

  private createState(name: CircuitStateName): CircuitState {
    switch (name) {
      case STATE_CLOSED:
        return new ClosedCircuitState(this);
      case STATE_OPEN:
        return new OpenCircuitState(this);
      case STATE_HALF_OPEN:
        return new HalfOpenCircuitState(this);
    }
  }

  private notifyStateChange(oldState: CircuitStateName, newState: CircuitStateName): void {
    this.dispatch('stateChange', (listener) => listener.stateChange(this.handle, oldState, newState));
  }

  private dispatch(hook: keyof CircuitBreakerListener, invoke: (listener: CircuitBreakerListener) => void): void {
    for (const listener of [...this.settings.listeners]) {
      try {
        invoke(listener);
      } catch (error) {
        this.logger.error('Breaker listener failed', {
          breaker: this.settings.name,
          hook,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
