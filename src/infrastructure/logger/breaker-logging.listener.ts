import type { CircuitBreakerHandle, CircuitStateName } from '@/domain/breaker';
import { NoopCircuitBreakerListener, STATE_OPEN } from '@/domain/breaker';
import type { ILogger } from '@/domain/services';

/** Reports breaker state changes and counted failures through the logger. */
export class BreakerLoggingListener extends NoopCircuitBreakerListener {
  constructor(private readonly logger: ILogger) {
    super();
  }

  failure(breaker: CircuitBreakerHandle, error: unknown): void {
    this.logger.debug('Breaker counted a failure', {
      breaker: breaker.name,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  stateChange(breaker: CircuitBreakerHandle, oldState: CircuitStateName, newState: CircuitStateName): void {
    const context = { breaker: breaker.name, from: oldState, to: newState };
    if (newState === STATE_OPEN) {
      this.logger.warn('Breaker opened', { ...context, resetTimeoutMs: breaker.resetTimeoutMs });
    } else {
      this.logger.log('Breaker state changed', context);
    }
  }
}
