import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { CircuitBreakerError } from '@/domain/breaker';
import { LoggerService } from '@/infrastructure/logger';

interface ErrorResponse {
  statusCode: number;
  message: string | string[];
  error: string;
  timestamp: string;
  path: string;
  breaker?: string;
}

/**
 * Maps HTTP status codes to standard error names (RFC 7231).
 */
const HTTP_STATUS_NAMES: Record<number, string> = {
  [HttpStatus.BAD_REQUEST]: 'Bad Request',
  [HttpStatus.UNAUTHORIZED]: 'Unauthorized',
  [HttpStatus.FORBIDDEN]: 'Forbidden',
  [HttpStatus.NOT_FOUND]: 'Not Found',
  [HttpStatus.METHOD_NOT_ALLOWED]: 'Method Not Allowed',
  [HttpStatus.CONFLICT]: 'Conflict',
  [HttpStatus.UNPROCESSABLE_ENTITY]: 'Unprocessable Entity',
  [HttpStatus.TOO_MANY_REQUESTS]: 'Too Many Requests',
  [HttpStatus.INTERNAL_SERVER_ERROR]: 'Internal Server Error',
  [HttpStatus.BAD_GATEWAY]: 'Bad Gateway',
  [HttpStatus.SERVICE_UNAVAILABLE]: 'Service Unavailable',
  [HttpStatus.GATEWAY_TIMEOUT]: 'Gateway Timeout',
};

function isMessage(value: unknown): value is string | string[] {
  return typeof value === 'string' || (Array.isArray(value) && value.every((item) => typeof item === 'string'));
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new LoggerService(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message: string | string[] = 'Internal server error';
    let error = 'Internal Server Error';
    let breaker: string | undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'string') {
        message = exceptionResponse;
        error = HTTP_STATUS_NAMES[status] || exception.name;
      } else {
        const responseMessage: unknown = Reflect.get(exceptionResponse, 'message');
        const responseError: unknown = Reflect.get(exceptionResponse, 'error');
        message = isMessage(responseMessage) ? responseMessage : message;
        error = typeof responseError === 'string' ? responseError : exception.name;
      }
    } else if (exception instanceof CircuitBreakerError) {
      // An open circuit is a dependency outage, not a bug in this service
      status = HttpStatus.SERVICE_UNAVAILABLE;
      message = exception.message;
      error = HTTP_STATUS_NAMES[status];
      breaker = exception.breakerName;
    } else if (exception instanceof Error) {
      message = exception.message;
      error = exception.name;
    }

    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error,
      timestamp: new Date().toISOString(),
      path: request.url,
      ...(breaker !== undefined && { breaker }),
    };

    if (exception instanceof CircuitBreakerError) {
      this.logger.warn('Dependency unavailable', { error: errorResponse, state: exception.state });
    } else if (status >= 500) {
      this.logger.error('Internal error', {
        error: errorResponse,
        stack: exception instanceof Error ? exception.stack : undefined,
      });
    } else {
      this.logger.warn('Request error', { error: errorResponse });
    }

    response.status(status).send(errorResponse);
  }
}
