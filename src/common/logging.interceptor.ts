import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable, tap } from 'rxjs';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const req = http.getRequest<Request>();
    const startedAt = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          const res = http.getResponse<Response>();
          this.logger.log(
            `${req.method} ${req.url} ${res.statusCode} ${Date.now() - startedAt}ms`,
          );
        },
        // 5xx errors are logged with their stack by AllExceptionsFilter.
        error: (error: unknown) => {
          if (!(error instanceof HttpException) || error.getStatus() >= 500) {
            return;
          }
          this.logger.warn(
            `${req.method} ${req.url} ${error.getStatus()} ${Date.now() - startedAt}ms: ${error.message}`,
          );
        },
      }),
    );
  }
}
