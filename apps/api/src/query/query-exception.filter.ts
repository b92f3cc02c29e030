import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { AppError, UpstreamRateLimitedError, publicMessage } from '../common/errors';

function kindForHttpStatus(status: number): string {
  if (status === HttpStatus.BAD_REQUEST) return 'ValidationError';
  if (status === HttpStatus.NOT_FOUND) return 'NotFoundError';
  return 'HttpError';
}

/** Renders every failure as `{ statusCode, error, message }`, `error` being the machine-readable kind. */
@Catch()
export class QueryExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(QueryExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();

    if (exception instanceof AppError) {
      const status = exception.status;
      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(`${exception.kind}: ${exception.message}`);
      }
      response.status(status).json({
        statusCode: status,
        error: exception.kind,
        message: publicMessage(exception),
        ...(exception instanceof UpstreamRateLimitedError && exception.retryAfterSeconds !== undefined
          ? { retryAfterSeconds: exception.retryAfterSeconds }
          : {}),
      });
      return;
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const res = exception.getResponse();
      const raw =
        typeof res === 'object' && res !== null && 'message' in res ? res.message : exception.message;
      const msg = Array.isArray(raw) ? String(raw[0]) : typeof raw === 'string' ? raw : exception.message;
      response.status(status).json({ statusCode: status, error: kindForHttpStatus(status), message: msg });
      return;
    }

    this.logger.error(
      'Unhandled exception',
      exception instanceof Error ? exception.stack : String(exception),
    );
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'InternalError',
      message: 'Internal error.',
    });
  }
}
