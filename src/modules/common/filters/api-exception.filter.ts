import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { Response } from 'express';

import {
  ConflictError,
  PersistenceTimeoutError,
  RepositoryNotImplementedError,
} from '../../../domain/errors/repository.errors';

export interface ApiErrorBody {
  statusCode: number;
  error: string;
  message: string | string[];
}

const INTERNAL_ERROR_MESSAGE = 'Internal server error';

/** HTTP status for anything a request handler can throw. */
export function httpStatusFor(error: unknown): number {
  if (error instanceof HttpException) return error.getStatus();
  if (error instanceof ConflictError) return HttpStatus.CONFLICT;
  if (error instanceof RepositoryNotImplementedError) return HttpStatus.NOT_IMPLEMENTED;
  if (error instanceof PersistenceTimeoutError) return HttpStatus.SERVICE_UNAVAILABLE;
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

function reasonPhrase(status: number): string {
  switch (status) {
    case HttpStatus.CONFLICT:
      return 'Conflict';
    case HttpStatus.NOT_IMPLEMENTED:
      return 'Not Implemented';
    case HttpStatus.SERVICE_UNAVAILABLE:
      return 'Service Unavailable';
    default:
      return 'Internal Server Error';
  }
}

/**
 * Global exception filter.
 *
 * Every error leaves as `{ statusCode, error, message }`. HttpExceptions keep
 * their own status and message; repository errors that escape a service are
 * mapped by kind. Storage failures never expose driver detail.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const status = httpStatusFor(exception);
    response.status(status).json(this.toBody(exception, status));
  }

  private toBody(exception: unknown, status: number): ApiErrorBody {
    if (exception instanceof HttpException) {
      const raw = exception.getResponse();
      if (typeof raw === 'string') {
        return { statusCode: status, error: exception.name, message: raw };
      }
      const error = 'error' in raw && typeof raw.error === 'string' ? raw.error : exception.name;
      const message =
        'message' in raw && (typeof raw.message === 'string' || isStringArray(raw.message))
          ? raw.message
          : exception.message;
      return { statusCode: status, error, message };
    }

    if (
      exception instanceof ConflictError ||
      exception instanceof RepositoryNotImplementedError ||
      exception instanceof PersistenceTimeoutError
    ) {
      return { statusCode: status, error: reasonPhrase(status), message: exception.message };
    }

    return { statusCode: status, error: reasonPhrase(status), message: INTERNAL_ERROR_MESSAGE };
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}
