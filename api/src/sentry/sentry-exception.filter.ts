import {
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { ExceptionFilter } from '@nestjs/common';
import * as Sentry from '@sentry/nestjs';
import type { Response } from 'express';

/**
 * Global exception filter: reports server-side failures to Sentry and
 * answers with a JSON error body.
 *
 * Registered with app.useGlobalFilters(new ...), outside DI, so it cannot
 * extend SentryGlobalFilter (which needs HttpAdapterHost).
 * Non-HTTP contexts (lifecycle hooks) are captured and re-thrown.
 */
@Catch()
export class SentryExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost): void {
    if (host.getType() !== 'http') {
      Sentry.captureException(exception);
      throw exception;
    }

    const response = host.switchToHttp().getResponse<Response>();
    if (response.headersSent) {
      return;
    }

    if (!(exception instanceof HttpException)) {
      Sentry.captureException(exception);
      response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        message: 'Internal server error',
      });
      return;
    }

    const status = exception.getStatus();
    const body = exception.getResponse();
    // 4xx are client errors, not ours
    if (status >= 500) {
      Sentry.captureException(exception);
    }
    response
      .status(status)
      .json(
        typeof body === 'string' ? { statusCode: status, message: body } : body,
      );
  }
}
