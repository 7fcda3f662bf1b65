import { Inject, Injectable } from '@nestjs/common';
import type { Redis } from 'ioredis';
import { STATE_OPEN } from '@/domain/breaker';
import { ComponentHealthDto, HealthResponseDto, HealthStatus } from '@/application/dtos/health-response.dto';
import { REDIS_CLIENT } from '@/infrastructure/redis';
import { BreakerRegistry } from './breaker-registry.service';

/** Timeout in milliseconds for each health check component */
const COMPONENT_TIMEOUT_MS = 3000;

/**
 * Health check service for liveness/readiness probes.
 * Tests connectivity to the shared breaker storage and reports open breakers.
 */
@Injectable()
export class HealthService {
  constructor(
    private readonly registry: BreakerRegistry,
    @Inject(REDIS_CLIENT)
    private readonly redis: Redis | null,
  ) {}

  /** Checks all components and returns aggregated health status. */
  async check(): Promise<HealthResponseDto> {
    const [storage, breakers] = await Promise.all([this.checkRedis(), this.registry.list()]);
    const openBreakers = breakers.filter((breaker) => breaker.state === STATE_OPEN).map((breaker) => breaker.name);

    const components = storage ? [storage] : [];
    const status = this.determineOverallStatus(components, openBreakers.length > 0);

    return {
      status,
      timestamp: new Date().toISOString(),
      ...(storage && { storage }),
      openBreakers,
    };
  }

  /** Checks Redis connectivity; nothing to check when breakers live in memory. */
  private async checkRedis(): Promise<ComponentHealthDto | undefined> {
    if (!this.redis) return undefined;

    const start = Date.now();
    try {
      await this.withTimeout(this.redis.ping(), COMPONENT_TIMEOUT_MS);
      return {
        status: 'healthy',
        latencyMs: Date.now() - start,
      };
    } catch (error) {
      return {
        status: 'unhealthy',
        latencyMs: Date.now() - start,
        message: error instanceof Error ? error.message : 'Redis check failed',
      };
    }
  }

  /** Aggregates component statuses into overall health status. */
  private determineOverallStatus(criticalComponents: ComponentHealthDto[], hasOpenBreaker: boolean): HealthStatus {
    const hasUnhealthyCritical = criticalComponents.some((c) => c.status === 'unhealthy');
    if (hasUnhealthyCritical) {
      return 'unhealthy';
    }

    const hasDegraded = criticalComponents.some((c) => c.status === 'degraded');
    if (hasDegraded || hasOpenBreaker) {
      return 'degraded';
    }

    return 'healthy';
  }

  /** Rejects when `promise` does not settle within `ms`. */
  private async withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error('Timeout')), ms);
    });
    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
