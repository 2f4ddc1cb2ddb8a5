import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { randomUUID } from 'node:crypto';

import { DirectoryLogger } from './directory-logger.service';
import { LogCategory } from './log-levels';

export const SLOW_REQUEST_MS = 2000;

@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  constructor(private readonly logger: DirectoryLogger) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const response = httpContext.getResponse<Response>();
    const startedAt = Date.now();

    const incomingId = request.headers['x-request-id'];
    const requestId = typeof incomingId === 'string' && incomingId ? incomingId : randomUUID();
    response.setHeader('X-Request-Id', requestId);

    const url = request.originalUrl ?? request.url;

    // The whole handler pipeline runs inside the correlation context
    return new Observable(subscriber => {
      this.logger.runWithContext(
        { requestId, method: request.method, path: url, startTime: startedAt },
        () => {
          this.logger.info(LogCategory.HTTP, `→ ${request.method} ${url}`, {
            userAgent: request.headers['user-agent'],
            ip: request.ip,
          });

          next.handle().pipe(
            tap((responseBody: unknown) => {
              const durationMs = Date.now() - startedAt;
              this.logger.info(LogCategory.HTTP, `← ${response.statusCode} ${request.method} ${url}`, {
                status: response.statusCode,
                durationMs,
              });

              if (responseBody !== undefined) {
                this.logger.trace(LogCategory.HTTP, 'Response body', { body: responseBody });
              }

              if (durationMs > SLOW_REQUEST_MS) {
                this.logger.warn(LogCategory.HTTP, `Slow request: ${durationMs}ms`, { durationMs });
              }
            }),
            catchError((error: unknown) => {
              const durationMs = Date.now() - startedAt;
              const status = error instanceof HttpException ? error.getStatus() : 500;
              const message = `← ${status} ${request.method} ${url}`;

              if (status >= 500) {
                this.logger.error(LogCategory.HTTP, message, error, { status, durationMs });
              } else {
                this.logger.info(LogCategory.HTTP, message, { status, durationMs });
              }
              throw error;
            })
          ).subscribe(subscriber);
        }
      );
    });
  }
}
