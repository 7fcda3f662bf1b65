export { BaseCircuitBreaker, DEFAULT_FAIL_MAX, DEFAULT_RESET_TIMEOUT_MS } from './base-circuit-breaker';
export type { BreakerOptions } from './base-circuit-breaker';
export { CircuitBreaker } from './circuit-breaker';
export type { CircuitBreakerOptions } from './circuit-breaker';
export { SyncCircuitBreaker } from './sync-circuit-breaker';
export type { SyncCircuitBreakerOptions } from './sync-circuit-breaker';
export { ReentrantLock } from './reentrant-lock';
