import { Provider, Scope } from '@nestjs/common';
import { LOGGER_SERVICE } from '@/domain/services';
import { LoggerService } from './custom-logger.service';

/**
 * Binds LOGGER_SERVICE to a fresh LoggerService per injection, so every
 * consumer can set its own context.
 */
export const loggerProviders: Provider[] = [
  {
    provide: LOGGER_SERVICE,
    useFactory: () => new LoggerService(),
    scope: Scope.TRANSIENT,
  },
];
