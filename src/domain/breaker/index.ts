export { CircuitBreakerError } from './circuit-breaker.error';
export { NoopCircuitBreakerListener } from './circuit-breaker-listener';
export type { CircuitBreakerHandle, CircuitBreakerListener, GuardedOperation } from './circuit-breaker-listener';
export { CIRCUIT_STATES, STATE_CLOSED, STATE_HALF_OPEN, STATE_OPEN, isCircuitStateName } from './circuit-state';
export type { CircuitStateName } from './circuit-state';
export type { CircuitStorage, MaybePromise, SyncCircuitStorage } from './circuit-storage.interface';
export { isExcludedError } from './error-classification';
export type { ErrorClass, ErrorMatcher, ExcludedError } from './error-classification';
