import { Inject, Injectable, OnApplicationBootstrap, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Redis } from 'ioredis';
import type { BreakerStatusDto } from '@/application/dtos';
import type { CircuitBreakerListener, CircuitStateName, CircuitStorage, ExcludedError } from '@/domain/breaker';
import { STATE_CLOSED, STATE_HALF_OPEN, STATE_OPEN } from '@/domain/breaker';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { BreakerStorageKind, parseDependencyUrls } from '@/infrastructure/config';
import { BreakerLoggingListener } from '@/infrastructure/logger';
import { REDIS_CLIENT } from '@/infrastructure/redis';
import { CircuitBreaker } from '@/infrastructure/resilience';
import { MemoryCircuitStorage, RedisCircuitStorage } from '@/infrastructure/storage';

/** Creation-time options; ignored when the breaker already exists. */
export interface RegistryBreakerOptions {
  initialState?: CircuitStateName;
  excluded?: ExcludedError[];
  listeners?: CircuitBreakerListener[];
}

/**
 * One breaker per protected dependency, created on first use.
 * Breakers share the Redis connection but each only touches keys under
 * `{BREAKER_ENV}:{dependency}`.
 */
@Injectable()
export class BreakerRegistry implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly breakers = new Map<string, Promise<CircuitBreaker>>();

  constructor(
    private readonly configService: ConfigService,
    @Inject(REDIS_CLIENT)
    private readonly redis: Redis | null,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  private get serviceName(): string {
    return this.configService.get<string>('SERVICE_NAME', 'gateway');
  }

  /** Puts this service's own breaker on probation if a previous run left it open. */
  async onApplicationBootstrap(): Promise<void> {
    const breaker = await this.get(this.serviceName, { initialState: STATE_HALF_OPEN });
    const state = await breaker.getCurrentState();

    if (state === STATE_OPEN) {
      await breaker.halfOpen();
      this.logger.warn('Service breaker found open at startup, moved to half-open', {
        breaker: this.serviceName,
      });
    }
  }

  async onApplicationShutdown(): Promise<void> {
    this.reset();
    if (this.redis) {
      await this.redis.quit();
    }
  }

  /** Storage namespace for `dependency`. */
  namespace(dependency: string): string {
    return `${this.configService.get<string>('BREAKER_ENV', 'development')}:${dependency}`;
  }

  /** Returns the breaker for `dependency`, creating it on first use. */
  get(dependency: string, options: RegistryBreakerOptions = {}): Promise<CircuitBreaker> {
    const existing = this.breakers.get(dependency);
    if (existing) return existing;

    const created = this.create(dependency, options).catch((error: unknown) => {
      this.breakers.delete(dependency);
      throw error;
    });
    this.breakers.set(dependency, created);
    return created;
  }

  has(dependency: string): boolean {
    return this.breakers.has(dependency);
  }

  /** Registered breakers plus configured dependencies and this service itself. */
  knownDependencies(): string[] {
    const configured = parseDependencyUrls(this.configService.get<string>('DEPENDENCY_URLS', '')).keys();
    return [...new Set([this.serviceName, ...configured, ...this.breakers.keys()])].sort();
  }

  async snapshot(dependency: string): Promise<BreakerStatusDto> {
    const breaker = await this.get(dependency);
    const [state, failCounter] = await Promise.all([breaker.getCurrentState(), breaker.getFailCounter()]);

    return {
      name: dependency,
      namespace: this.namespace(dependency),
      state,
      failCounter,
      failMax: breaker.failMax,
      resetTimeoutMs: breaker.resetTimeoutMs,
    };
  }

  /** Snapshots of every breaker created so far. */
  async list(): Promise<BreakerStatusDto[]> {
    const names = [...this.breakers.keys()].sort();
    return Promise.all(names.map((name) => this.snapshot(name)));
  }

  /** Drops every breaker; the next lookup rebuilds it from current configuration. */
  reset(): void {
    if (this.breakers.size > 0) {
      this.logger.log('Breaker registry reset', { count: this.breakers.size });
    }
    this.breakers.clear();
  }

  private async create(dependency: string, options: RegistryBreakerOptions): Promise<CircuitBreaker> {
    const storage = await this.createStorage(dependency, options.initialState ?? STATE_CLOSED);

    const breaker = new CircuitBreaker({
      name: dependency,
      failMax: this.configService.get<number>('BREAKER_FAIL_MAX', 5),
      resetTimeoutMs: this.configService.get<number>('BREAKER_RESET_TIMEOUT_MS', 15000),
      countRejectedCalls: this.configService.get<boolean>('BREAKER_COUNT_REJECTED_CALLS', false),
      excluded: options.excluded,
      listeners: [new BreakerLoggingListener(this.logger), ...(options.listeners ?? [])],
      storage,
      logger: this.logger,
    });

    this.logger.log('Breaker registered', {
      breaker: dependency,
      storage: storage.name,
      namespace: this.namespace(dependency),
    });
    return breaker;
  }

  private async createStorage(dependency: string, initialState: CircuitStateName): Promise<CircuitStorage> {
    const kind = this.configService.get<BreakerStorageKind>('BREAKER_STORAGE', BreakerStorageKind.Memory);
    if (kind !== BreakerStorageKind.Redis || !this.redis) {
      return new MemoryCircuitStorage(initialState);
    }

    return new RedisCircuitStorage(this.redis, {
      namespace: this.namespace(dependency),
      initialState,
      fallbackState: this.configService.get<CircuitStateName>('BREAKER_FALLBACK_STATE', STATE_CLOSED),
      baseNamespace: this.configService.get<string>('BREAKER_BASE_NAMESPACE', 'breaker'),
      logger: this.logger,
    }).initialize();
  }
}
