export { BreakerLoggingListener } from './breaker-logging.listener';
export { LoggerService } from './custom-logger.service';
export { loggerProviders } from './logger.providers';
