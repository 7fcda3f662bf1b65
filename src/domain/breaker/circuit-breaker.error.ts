import type { CircuitStateName } from './circuit-state';

/**
 * Raised instead of running the operation when the circuit is open, and when a
 * failure trips the circuit or fails the half-open trial.
 */
export class CircuitBreakerError extends Error {
  constructor(
    message: string,
    public readonly breakerName: string | undefined,
    public readonly state: CircuitStateName,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CircuitBreakerError';
  }
}
