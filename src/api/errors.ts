import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';

/** Field name → messages, as produced by schema validation. */
export type FieldErrors = Record<string, string[]>;

/**
 * Malformed or semantically invalid payload. Rendered as 400.
 */
export class ValidationError extends Error {
  readonly statusCode = 400;

  constructor(
    message: string,
    public details?: FieldErrors,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Referenced entity does not exist. Rendered as 404.
 */
export class NotFoundError extends Error {
  readonly statusCode = 404;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Caller is authenticated but may not perform the action. Rendered as 403.
 */
export class PermissionDeniedError extends Error {
  readonly statusCode = 403;

  constructor(message = 'You do not have permission to perform this action') {
    super(message);
    this.name = 'PermissionDeniedError';
  }
}

/**
 * Action requires an identity and none was supplied. Rendered as 401.
 */
export class UnauthenticatedError extends Error {
  readonly statusCode = 401;

  constructor(message = 'Authentication credentials were not provided') {
    super(message);
    this.name = 'UnauthenticatedError';
  }
}

export type ApiError = ValidationError | NotFoundError | PermissionDeniedError | UnauthenticatedError;

export function isApiError(err: unknown): err is ApiError {
  return (
    err instanceof ValidationError ||
    err instanceof NotFoundError ||
    err instanceof PermissionDeniedError ||
    err instanceof UnauthenticatedError
  );
}

/** Body shape of every error response. */
export interface ErrorBody {
  error: string;
  details?: FieldErrors;
}

/**
 * Fastify error handler. Domain errors map to their status code, Fastify's own
 * client errors (bad JSON, body too large, rate limit) keep theirs, everything
 * else is logged and hidden behind a 500.
 */
export function apiErrorHandler(err: FastifyError | Error, req: FastifyRequest, reply: FastifyReply): FastifyReply {
  if (isApiError(err)) {
    const body: ErrorBody = { error: err.message };
    if (err instanceof ValidationError && err.details) {
      body.details = err.details;
    }
    return reply.code(err.statusCode).send(body);
  }

  const statusCode = 'statusCode' in err && typeof err.statusCode === 'number' ? err.statusCode : 500;
  if (statusCode >= 400 && statusCode < 500) {
    return reply.code(statusCode).send({ error: err.message } satisfies ErrorBody);
  }

  req.log.error({ err }, '[API] Unhandled error');
  return reply.code(500).send({ error: 'Internal Server Error' } satisfies ErrorBody);
}
