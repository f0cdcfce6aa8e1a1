import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { MulterError } from 'multer';

export type ApiErrorKind =
  | 'access_denied'
  | 'not_found'
  | 'bad_request'
  | 'unauthorized'
  | 'forbidden'
  | 'conflict'
  | 'internal';

const STATUS_BY_KIND: Record<ApiErrorKind, number> = {
  access_denied: 403,
  not_found: 404,
  bad_request: 400,
  unauthorized: 401,
  forbidden: 403,
  conflict: 409,
  internal: 500
};

export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly status: number;

  constructor(kind: ApiErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ApiError';
    this.kind = kind;
    this.status = STATUS_BY_KIND[kind];
  }
}

export class AccessDeniedError extends ApiError {
  constructor(message = 'Access denied') {
    super('access_denied', message);
    this.name = 'AccessDeniedError';
  }
}

export class NotFoundError extends ApiError {
  constructor(message = 'Not found') {
    super('not_found', message);
    this.name = 'NotFoundError';
  }
}

export class BadRequestError extends ApiError {
  constructor(message: string) {
    super('bad_request', message);
    this.name = 'BadRequestError';
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message = 'Unauthorized') {
    super('unauthorized', message);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends ApiError {
  constructor(message = 'Forbidden') {
    super('forbidden', message);
    this.name = 'ForbiddenError';
  }
}

export class ConflictError extends ApiError {
  constructor(message: string) {
    super('conflict', message);
    this.name = 'ConflictError';
  }
}

/** The cause is kept for server-side logging only; clients see `message`. */
export class InternalError extends ApiError {
  constructor(message: string, cause?: unknown) {
    super('internal', message, { cause });
    this.name = 'InternalError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  if (error instanceof MulterError) {
    return new BadRequestError(`Invalid upload: ${error.message}`);
  }
  // body-parser marks malformed JSON with a 4xx status
  if (error && typeof error === 'object' && (error as { type?: unknown }).type === 'entity.parse.failed') {
    return new BadRequestError('Invalid request body');
  }
  return new InternalError('Internal server error', error);
}

export function respondError(res: Response, error: unknown): void {
  const apiError = toApiError(error);
  if (apiError.kind === 'internal') {
    const cause = apiError.cause === undefined ? '' : ` (${errorMessage(apiError.cause)})`;
    console.error(`[treeserve] api: ${apiError.message}${cause}`);
  }
  if (res.headersSent) {
    res.destroy();
    return;
  }
  res.status(apiError.status).json({ error: apiError.message, kind: apiError.kind });
}

export function wrapAsync(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function createErrorMiddleware() {
  return (error: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    respondError(res, error);
  };
}
