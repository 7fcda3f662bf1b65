/**
 * Injection token for the logger used by breakers, storages and services.
 */
export const LOGGER_SERVICE = Symbol('LOGGER_SERVICE');

/**
 * Structured fields appended to a log line.
 */
export interface LogContext {
  [key: string]: unknown;
}

/**
 * Logging port. The breaker library only depends on this interface so that
 * tests and host applications can plug their own sink.
 */
export interface ILogger {
  log(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}
