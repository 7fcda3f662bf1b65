import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { BreakerRegistry, HealthService, ServiceClient } from './application/services';
import { validate } from './infrastructure/config';
import { loggerProviders } from './infrastructure/logger/logger.providers';
import { redisProviders } from './infrastructure/redis';
import { BreakersController, HealthController } from './presentation/controllers';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),
    ThrottlerModule.forRoot([{ ttl: 60000, limit: 100 }]),
  ],
  controllers: [BreakersController, HealthController],
  providers: [
    ...loggerProviders,
    ...redisProviders,
    BreakerRegistry,
    ServiceClient,
    HealthService,
    { provide: APP_GUARD, useClass: ThrottlerGuard },
  ],
})
export class AppModule {}
