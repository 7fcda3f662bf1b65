export { LOGGER_SERVICE } from './logger.interface';
export type { ILogger, LogContext } from './logger.interface';
