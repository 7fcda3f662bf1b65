export const STATE_CLOSED = 'closed';
export const STATE_OPEN = 'open';
export const STATE_HALF_OPEN = 'half-open';

export const CIRCUIT_STATES = [STATE_CLOSED, STATE_OPEN, STATE_HALF_OPEN] as const;

/**
 * Canonical breaker state as persisted by a storage backend.
 */
export type CircuitStateName = (typeof CIRCUIT_STATES)[number];

export function isCircuitStateName(value: unknown): value is CircuitStateName {
  return typeof value === 'string' && CIRCUIT_STATES.some((state) => state === value);
}
