import type { Redis } from 'ioredis';
import type { CircuitStateName, CircuitStorage } from '@/domain/breaker';
import { STATE_CLOSED, isCircuitStateName } from '@/domain/breaker';
import type { ILogger } from '@/domain/services';
import { LoggerService } from '@/infrastructure/logger/custom-logger.service';

export const DEFAULT_BASE_NAMESPACE = 'breaker';

/**
 * Writes ARGV[1] into KEYS[1] only when it is greater than the stored value,
 * so a late Open transition never regresses a more recent one.
 */
export const SET_IF_GREATER_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if (not current) or (tonumber(ARGV[1]) > tonumber(current)) then
  redis.call('SET', KEYS[1], ARGV[1])
  return 1
end
return 0
`;

export interface RedisCircuitStorageOptions {
  /** Instance namespace, e.g. `production:billing`. */
  namespace?: string;
  /** State reported while the state key does not exist yet. */
  initialState?: CircuitStateName;
  /** State reported when Redis cannot be read. */
  fallbackState?: CircuitStateName;
  baseNamespace?: string;
  logger?: ILogger;
}

/**
 * Shared storage on Redis; breakers in several processes using the same
 * namespace observe one canonical state.
 *
 * Keys: `{base}:{namespace}:state`, `...:fail_counter`, `...:opened_at`.
 * `opened_at` is stored as integer epoch seconds, so the probation delay can
 * end up to one second early; reset timeouts below ~2s are not meaningful.
 *
 * No method rejects: reads fall back, writes are logged and dropped.
 */
export class RedisCircuitStorage implements CircuitStorage {
  readonly name = 'redis';
  private readonly namespace: string | undefined;
  private readonly initialState: CircuitStateName;
  private readonly fallbackState: CircuitStateName;
  private readonly baseNamespace: string;
  private readonly logger: ILogger;

  constructor(
    private readonly redis: Redis,
    options: RedisCircuitStorageOptions = {},
  ) {
    this.namespace = options.namespace;
    this.initialState = options.initialState ?? STATE_CLOSED;
    this.fallbackState = options.fallbackState ?? STATE_CLOSED;
    this.baseNamespace = options.baseNamespace ?? DEFAULT_BASE_NAMESPACE;
    this.logger = options.logger ?? new LoggerService(RedisCircuitStorage.name);
  }

  /** Seeds state and counter without overwriting values another process already wrote. */
  async initialize(): Promise<this> {
    try {
      await this.redis.setnx(this.key('fail_counter'), 0);
      await this.redis.setnx(this.key('state'), this.initialState);
    } catch (error) {
      this.logFailure('initialize', error);
    }
    return this;
  }

  async getState(): Promise<CircuitStateName> {
    let stored: string | null;
    try {
      stored = await this.redis.get(this.key('state'));
    } catch (error) {
      this.logFailure('getState', error, { fallbackState: this.fallbackState });
      return this.fallbackState;
    }

    if (stored === null) return this.initialState;
    if (isCircuitStateName(stored)) return stored;

    this.logger.error('Unknown circuit state stored, using fallback', {
      key: this.key('state'),
      stored,
      fallbackState: this.fallbackState,
    });
    return this.fallbackState;
  }

  async setState(state: CircuitStateName): Promise<void> {
    try {
      await this.redis.set(this.key('state'), state);
    } catch (error) {
      this.logFailure('setState', error, { state });
    }
  }

  async getCounter(): Promise<number> {
    try {
      const value = await this.redis.get(this.key('fail_counter'));
      return value ? parseInt(value, 10) : 0;
    } catch (error) {
      this.logFailure('getCounter', error);
      return 0;
    }
  }

  async incrementCounter(): Promise<number> {
    try {
      return await this.redis.incr(this.key('fail_counter'));
    } catch (error) {
      this.logFailure('incrementCounter', error);
      return 0;
    }
  }

  async resetCounter(): Promise<void> {
    if ((await this.getCounter()) === 0) return;

    try {
      await this.redis.set(this.key('fail_counter'), 0);
    } catch (error) {
      this.logFailure('resetCounter', error);
    }
  }

  async getOpenedAt(): Promise<Date | null> {
    try {
      const timestamp = await this.redis.get(this.key('opened_at'));
      return timestamp ? new Date(parseInt(timestamp, 10) * 1000) : null;
    } catch (error) {
      this.logFailure('getOpenedAt', error);
      return null;
    }
  }

  async setOpenedAt(openedAt: Date): Promise<void> {
    const seconds = Math.floor(openedAt.getTime() / 1000);
    try {
      await this.redis.eval(SET_IF_GREATER_SCRIPT, 1, this.key('opened_at'), seconds);
    } catch (error) {
      this.logFailure('setOpenedAt', error, { seconds });
    }
  }

  /** Fully qualified key for `field`. */
  key(field: string): string {
    const parts = [this.baseNamespace];
    if (this.namespace) parts.push(this.namespace);
    parts.push(field);
    return parts.join(':');
  }

  private logFailure(operation: string, error: unknown, context: Record<string, unknown> = {}): void {
    this.logger.error('Redis command failed', {
      operation,
      namespace: this.namespace,
      ...context,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
