import { HttpStatus } from '@nestjs/common';

/**
 * Machine-readable failure kinds returned to callers and stored in session
 * history. Each kind maps to exactly one HTTP status (see {@link STATUS_BY_KIND}).
 */
export type ErrorKind =
  | 'ValidationError'
  | 'NotFoundError'
  | 'CollisionError'
  | 'UpstreamTimeout'
  | 'UpstreamError'
  | 'UpstreamRateLimited'
  | 'SyntaxError'
  | 'PermissionError'
  | 'TimeoutError'
  | 'UnsafeStatementError'
  | 'InternalError';

export const STATUS_BY_KIND: Record<ErrorKind, HttpStatus> = {
  ValidationError: HttpStatus.BAD_REQUEST,
  SyntaxError: HttpStatus.BAD_REQUEST,
  PermissionError: HttpStatus.FORBIDDEN,
  NotFoundError: HttpStatus.NOT_FOUND,
  TimeoutError: HttpStatus.REQUEST_TIMEOUT,
  UnsafeStatementError: HttpStatus.UNPROCESSABLE_ENTITY,
  UpstreamRateLimited: HttpStatus.TOO_MANY_REQUESTS,
  CollisionError: HttpStatus.INTERNAL_SERVER_ERROR,
  UpstreamError: HttpStatus.BAD_GATEWAY,
  UpstreamTimeout: HttpStatus.GATEWAY_TIMEOUT,
  InternalError: HttpStatus.INTERNAL_SERVER_ERROR,
};

export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get status(): HttpStatus {
    return STATUS_BY_KIND[this.kind];
  }
}

export class ValidationError extends AppError {
  readonly kind = 'ValidationError';
}

export class NotFoundError extends AppError {
  readonly kind = 'NotFoundError';
}

/** Identifier allocation kept colliding; only surfaces once retries are exhausted. */
export class CollisionError extends AppError {
  readonly kind = 'CollisionError';
}

export class UpstreamTimeoutError extends AppError {
  readonly kind = 'UpstreamTimeout';
}

export class UpstreamError extends AppError {
  readonly kind = 'UpstreamError';

  constructor(
    message: string,
    readonly upstreamStatus?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class UpstreamRateLimitedError extends AppError {
  readonly kind = 'UpstreamRateLimited';

  constructor(
    message: string,
    readonly retryAfterSeconds?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The database rejected the statement. */
export class SqlSyntaxError extends AppError {
  readonly kind = 'SyntaxError';
}

export class SqlPermissionError extends AppError {
  readonly kind = 'PermissionError';
}

export class ExecutionTimeoutError extends AppError {
  readonly kind = 'TimeoutError';
}

export class UnsafeStatementError extends AppError {
  readonly kind = 'UnsafeStatementError';
}

/** Wraps a failure no other kind describes; the message is not shown to callers. */
export class InternalError extends AppError {
  readonly kind = 'InternalError';
}

/** Returns `err` when it is already classified, else an {@link InternalError} around it. */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  return new InternalError(errorMessage(err), { cause: err });
}

/** Message safe to return to callers. */
export function publicMessage(err: AppError): string {
  return err instanceof InternalError ? 'Internal error.' : err.message;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
