import { ArgumentsHost, Catch, ExceptionFilter, HttpException } from '@nestjs/common';
import type { Response } from 'express';

import { DirectoryBackendError } from '../../../domain/errors/directory-backend.error';
import { DirectoryLogger } from '../../logging/directory-logger.service';
import { LogCategory } from '../../logging/log-levels';
import { buildErrorDocument, isErrorDocument, type ErrorDocument } from '../common/directory-errors';
import { INTERNAL_ERROR_DETAIL } from '../common/directory-constants';

/**
 * Global exception filter: every failure leaves as
 * `{ errors: [{ status, title, detail }] }` with `application/json`.
 *
 * Exceptions built with createDirectoryError pass through unchanged; other
 * HttpExceptions (router 404s, guard rejections, pipes) are wrapped; anything
 * else is a 500 with a fixed detail and is logged.
 */
@Catch()
export class DirectoryExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: DirectoryLogger) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, body } = this.toErrorResponse(exception);

    response
      .status(status)
      .setHeader('Content-Type', 'application/json; charset=utf-8')
      .json(body);
  }

  private toErrorResponse(exception: unknown): { status: number; body: ErrorDocument } {
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const raw = exception.getResponse();
      if (isErrorDocument(raw)) {
        return { status, body: raw };
      }
      return { status, body: buildErrorDocument(status, describeHttpException(exception, raw)) };
    }

    if (exception instanceof DirectoryBackendError) {
      this.logger.error(LogCategory.DIRECTORY, 'Directory backend failure', exception);
      return { status: 500, body: buildErrorDocument(500, exception.message) };
    }

    this.logger.error(LogCategory.GENERAL, 'Unhandled exception', exception);
    return { status: 500, body: buildErrorDocument(500, INTERNAL_ERROR_DETAIL) };
  }
}

/** Nest's default bodies look like `{ statusCode, message, error }`; message may be a list. */
function describeHttpException(exception: HttpException, raw: string | object): string {
  if (typeof raw === 'string') return raw;
  if ('message' in raw) {
    const { message } = raw;
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) return message.map(String).join('; ');
  }
  return exception.message;
}
