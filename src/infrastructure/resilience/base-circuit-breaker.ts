import type {
  CircuitBreakerHandle,
  CircuitBreakerListener,
  CircuitStorage,
  ExcludedError,
} from '@/domain/breaker';
import type { ILogger } from '@/domain/services';
import { LoggerService } from '@/infrastructure/logger/custom-logger.service';
import { BreakerCore } from './breaker-core';
import { ReentrantLock } from './reentrant-lock';

export const DEFAULT_FAIL_MAX = 5;
export const DEFAULT_RESET_TIMEOUT_MS = 60_000;

/** Options shared by both calling conventions. */
export interface BreakerOptions {
  /** Consecutive qualifying failures tolerated before the circuit opens. */
  failMax?: number;
  /** How long the circuit stays open before a trial call is allowed. */
  resetTimeoutMs?: number;
  /** Error classifications treated as business errors (never counted). */
  excluded?: ExcludedError[];
  listeners?: CircuitBreakerListener[];
  name?: string;
  /**
   * Count calls rejected while the circuit is open against the failure
   * counter. Off by default: only calls that ran the operation are counted.
   */
  countRejectedCalls?: boolean;
  logger?: ILogger;
  /** Time source in epoch milliseconds. */
  clock?: () => number;
}

/**
 * Configuration, listener registry and lock shared by {@link CircuitBreaker}
 * and {@link SyncCircuitBreaker}. Subclasses only choose how flows are driven.
 */
export abstract class BaseCircuitBreaker implements CircuitBreakerHandle {
  protected readonly core: BreakerCore;
  protected readonly lock = new ReentrantLock();

  protected constructor(storage: CircuitStorage, options: BreakerOptions) {
    const failMax = options.failMax ?? DEFAULT_FAIL_MAX;
    const resetTimeoutMs = options.resetTimeoutMs ?? DEFAULT_RESET_TIMEOUT_MS;
    assertFailMax(failMax);
    assertResetTimeout(resetTimeoutMs);

    this.core = new BreakerCore(
      storage,
      {
        name: options.name,
        failMax,
        resetTimeoutMs,
        countRejectedCalls: options.countRejectedCalls ?? false,
        excludedErrors: [...(options.excluded ?? [])],
        listeners: [...(options.listeners ?? [])],
      },
      this,
      options.logger ?? new LoggerService('CircuitBreaker'),
      options.clock,
    );
  }

  get storage(): CircuitStorage {
    return this.core.storage;
  }

  get name(): string | undefined {
    return this.core.settings.name;
  }

  set name(name: string | undefined) {
    this.core.settings.name = name;
  }

  get failMax(): number {
    return this.core.settings.failMax;
  }

  set failMax(failMax: number) {
    assertFailMax(failMax);
    this.core.settings.failMax = failMax;
  }

  get resetTimeoutMs(): number {
    return this.core.settings.resetTimeoutMs;
  }

  set resetTimeoutMs(timeoutMs: number) {
    assertResetTimeout(timeoutMs);
    this.core.settings.resetTimeoutMs = timeoutMs;
  }

  get countRejectedCalls(): boolean {
    return this.core.settings.countRejectedCalls;
  }

  set countRejectedCalls(enabled: boolean) {
    this.core.settings.countRejectedCalls = enabled;
  }

  get excludedErrors(): readonly ExcludedError[] {
    return [...this.core.settings.excludedErrors];
  }

  addExcludedError(excluded: ExcludedError): void {
    this.core.settings.excludedErrors.push(excluded);
  }

  addExcludedErrors(...excluded: ExcludedError[]): void {
    excluded.forEach((classification) => this.addExcludedError(classification));
  }

  removeExcludedError(excluded: ExcludedError): void {
    const index = this.core.settings.excludedErrors.indexOf(excluded);
    if (index === -1) {
      throw new Error('Error classification is not excluded by this breaker');
    }
    this.core.settings.excludedErrors.splice(index, 1);
  }

  get listeners(): readonly CircuitBreakerListener[] {
    return [...this.core.settings.listeners];
  }

  addListener(listener: CircuitBreakerListener): void {
    this.core.settings.listeners.push(listener);
  }

  addListeners(...listeners: CircuitBreakerListener[]): void {
    listeners.forEach((listener) => this.addListener(listener));
  }

  removeListener(listener: CircuitBreakerListener): void {
    const index = this.core.settings.listeners.indexOf(listener);
    if (index === -1) {
      throw new Error('Listener is not registered on this breaker');
    }
    this.core.settings.listeners.splice(index, 1);
  }

  /** True when `error` would count against the dependency. */
  isSystemError(error: unknown): boolean {
    return this.core.isSystemError(error);
  }
}

function assertFailMax(failMax: number): void {
  if (!Number.isInteger(failMax) || failMax < 1) {
    throw new RangeError(`failMax must be a positive integer, got ${failMax}`);
  }
}

function assertResetTimeout(timeoutMs: number): void {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new RangeError(`resetTimeoutMs must be greater than zero, got ${timeoutMs}`);
  }
}
