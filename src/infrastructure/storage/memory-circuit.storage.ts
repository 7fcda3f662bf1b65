import type { CircuitStateName, SyncCircuitStorage } from '@/domain/breaker';
import { STATE_CLOSED } from '@/domain/breaker';

/**
 * Single-process storage with immediate consistency. `openedAt` keeps
 * millisecond precision.
 */
export class MemoryCircuitStorage implements SyncCircuitStorage {
  readonly name = 'memory';
  private state: CircuitStateName;
  private failCounter = 0;
  private openedAt: Date | null = null;

  constructor(initialState: CircuitStateName = STATE_CLOSED) {
    this.state = initialState;
  }

  getState(): CircuitStateName {
    return this.state;
  }

  setState(state: CircuitStateName): void {
    this.state = state;
  }

  getCounter(): number {
    return this.failCounter;
  }

  incrementCounter(): number {
    this.failCounter += 1;
    return this.failCounter;
  }

  resetCounter(): void {
    this.failCounter = 0;
  }

  getOpenedAt(): Date | null {
    return this.openedAt;
  }

  setOpenedAt(openedAt: Date): void {
    if (!this.openedAt || openedAt.getTime() > this.openedAt.getTime()) {
      this.openedAt = openedAt;
    }
  }
}
