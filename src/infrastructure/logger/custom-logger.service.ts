import { ConsoleLogger, Injectable } from '@nestjs/common';
import type { ILogger, LogContext } from '@/domain/services';

interface RenderedLine {
  message: string;
  context?: string;
  stack?: string;
}

/**
 * Console logger that accepts a metadata object after the message and
 * renders it as JSON: `Breaker opened {"breaker":"billing"}`.
 *
 * Plain NestJS calls (`log(message, context)`, `error(message, stack, context)`)
 * keep their usual meaning.
 */
@Injectable()
export class LoggerService extends ConsoleLogger implements ILogger {
  constructor(context: string = '') {
    super(context);
  }

  log(message: string, ...optionalParams: unknown[]) {
    const line = this.render(message, optionalParams);
    if (line.context) super.log(line.message, line.context);
    else super.log(line.message);
  }

  warn(message: string, ...optionalParams: unknown[]) {
    const line = this.render(message, optionalParams);
    if (line.context) super.warn(line.message, line.context);
    else super.warn(line.message);
  }

  debug(message: string, ...optionalParams: unknown[]) {
    const line = this.render(message, optionalParams);
    if (line.context) super.debug(line.message, line.context);
    else super.debug(line.message);
  }

  verbose(message: string, ...optionalParams: unknown[]) {
    const line = this.render(message, optionalParams);
    if (line.context) super.verbose(line.message, line.context);
    else super.verbose(line.message);
  }

  error(message: string, ...optionalParams: unknown[]) {
    const line = this.render(message, optionalParams);
    if (line.stack) super.error(line.message, line.stack, line.context ?? this.context);
    else if (line.context) super.error(line.message, line.context);
    else super.error(line.message);
  }

  private render(message: string, optionalParams: unknown[]): RenderedLine {
    const [first, ...rest] = optionalParams;

    if (isLogContext(first)) {
      const { stack, ...fields } = first;
      const rendered = Object.keys(fields).length > 0 ? `${message} ${safeStringify(fields)}` : message;
      return {
        message: rendered,
        context: typeof rest[0] === 'string' ? rest[0] : undefined,
        stack: typeof stack === 'string' ? stack : undefined,
      };
    }

    const strings = optionalParams.filter((param): param is string => typeof param === 'string');
    if (strings.length >= 2) {
      return { message, stack: strings[0], context: strings[1] };
    }
    return { message, context: strings[0] };
  }
}

function isLogContext(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function safeStringify(fields: LogContext): string {
  try {
    return JSON.stringify(fields);
  } catch {
    return '[unserializable metadata]';
  }
}
