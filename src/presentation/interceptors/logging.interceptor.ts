import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { Observable, tap } from 'rxjs';
import { LoggerService } from '@/infrastructure/logger';

/** Logs one line per request with its status and duration. */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new LoggerService('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<FastifyRequest>();
    const response = ctx.getResponse<FastifyReply>();

    const { method, url } = request;
    const startTime = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          this.logger.log('Request completed', {
            method,
            url,
            statusCode: response.statusCode,
            duration: `${Date.now() - startTime}ms`,
          });
        },
        error: () => {
          // Errors are logged by HttpExceptionFilter
        },
      }),
    );
  }
}
