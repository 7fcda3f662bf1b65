import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Redis } from 'ioredis';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import type { EnvironmentVariables } from '@/infrastructure/config';
import { BreakerStorageKind } from '@/infrastructure/config';

/**
 * Injection token for the Redis connection shared by every breaker.
 * Resolves to `null` when breakers keep their state in memory.
 */
export const REDIS_CLIENT = Symbol('REDIS_CLIENT');

/**
 * Builds the breaker connection. Connection errors and reconnect attempts
 * go through the application logger.
 */
export function createRedisClient(configService: ConfigService<EnvironmentVariables>, logger: ILogger): Redis {
  const redis = new Redis({
    host: configService.get('REDIS_HOST'),
    port: configService.get('REDIS_PORT'),
    db: configService.get('REDIS_DB'),
    maxRetriesPerRequest: 1,
    lazyConnect: true,
  });

  redis.on('error', (error: Error) => {
    logger.error('Redis connection error', { error: error.message });
  });

  redis.on('reconnecting', (delayMs: number) => {
    logger.warn('Redis reconnecting', { delayMs });
  });

  return redis;
}

export const redisProviders: Provider[] = [
  {
    provide: REDIS_CLIENT,
    inject: [ConfigService, LOGGER_SERVICE],
    useFactory: (configService: ConfigService<EnvironmentVariables>, logger: ILogger): Redis | null => {
      if (configService.get('BREAKER_STORAGE') !== BreakerStorageKind.Redis) {
        return null;
      }
      return createRedisClient(configService, logger);
    },
  },
];
