import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { randomUUID } from 'node:crypto';

import { httpStatusFor } from '../common/filters/api-exception.filter';
import { AppLogger } from './app-logger.service';
import { LogCategory } from './log-levels';

const SLOW_REQUEST_MS = 2000;

@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  constructor(private readonly logger: AppLogger) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const response = httpContext.getResponse<Response>();
    const startedAt = Date.now();
    const path = request.originalUrl ?? request.url;

    // Generate or propagate correlation request ID
    const requestId = request.header('x-request-id') || randomUUID();
    response.setHeader('X-Request-Id', requestId);

    // Run the entire request pipeline within a correlation context
    return new Observable(subscriber => {
      this.logger.runWithContext({ requestId, method: request.method, path, startTime: startedAt }, () => {
        this.logger.info(LogCategory.HTTP, `→ ${request.method} ${path}`, {
          userAgent: request.header('user-agent'),
          ip: request.ip,
        });

        const includePayloads = this.logger.getConfig().includePayloads;
        if (includePayloads && isNonEmptyObject(request.body)) {
          this.logger.trace(LogCategory.HTTP, 'Request body', { body: request.body });
        }

        next
          .handle()
          .pipe(
            tap((responseBody: unknown) => {
              const durationMs = Date.now() - startedAt;
              this.logger.info(LogCategory.HTTP, `← ${response.statusCode} ${request.method} ${path}`, {
                status: response.statusCode,
                durationMs,
              });

              if (includePayloads && responseBody !== undefined) {
                this.logger.trace(LogCategory.HTTP, 'Response body', { body: responseBody });
              }

              if (durationMs > SLOW_REQUEST_MS) {
                this.logger.warn(LogCategory.HTTP, `Slow request: ${durationMs}ms`, {
                  status: response.statusCode,
                  durationMs,
                });
              }
            }),
            catchError((error: unknown) => {
              const durationMs = Date.now() - startedAt;
              const status = httpStatusFor(error);
              if (status < 500) {
                this.logger.warn(LogCategory.HTTP, `← ${status} ${request.method} ${path}`, { status, durationMs });
              } else {
                this.logger.error(LogCategory.HTTP, `← ${status} ${request.method} ${path}`, error, {
                  status,
                  durationMs,
                });
              }
              throw error;
            }),
          )
          .subscribe(subscriber);
      });
    });
  }
}

function isNonEmptyObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.keys(value).length > 0;
}
