/**
 * API Middleware — request context, query parsing and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';
import { MetadataError, apiError, createTypedError, getHttpStatus, validationError } from '../domain/errors';
import { Logger, logger } from '../logger';

/** Request with a correlation id and a logger bound to it. */
export interface ContextRequest extends Request {
  requestId?: string;
  log?: Logger;
}

/** Attach a request id (honouring an incoming X-Request-Id) and a child logger. */
export function requestContext() {
  return (req: ContextRequest, res: Response, next: NextFunction) => {
    const incoming = req.headers['x-request-id'];
    const requestId = typeof incoming === 'string' && incoming !== '' ? incoming : uuid();
    req.requestId = requestId;
    req.log = logger.child({ requestId });
    res.setHeader('X-Request-Id', requestId);
    req.log.debug('Request received', { method: req.method, path: req.path, query: req.query });
    next();
  };
}

/** Raw request body; an absent body is empty. */
export function rawBody(req: Request): Buffer {
  return Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
}

/** First value of a query parameter. */
export function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const first = value.find((v): v is string => typeof v === 'string');
    return first;
  }
  return undefined;
}

/** Every value of a repeated query parameter. */
export function queryParams(req: Request, name: string): string[] {
  const value = req.query[name];
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string');
  return [];
}

/** Validation failure raised while reading request parameters. */
export class RequestValidationError extends MetadataError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(validationError(message, details));
    this.name = 'RequestValidationError';
  }
}

/** A required query parameter. */
export function requireQueryParam(req: Request, name: string): string {
  const value = queryParam(req, name);
  if (!value) {
    throw new RequestValidationError(`Expecting '${name}' parameter`, { parameter: name });
  }
  return value;
}

/** Map an error onto a typed HTTP error response. */
export function sendError(req: ContextRequest, res: Response, err: unknown): void {
  const log = req.log ?? logger;
  if (err instanceof MetadataError) {
    const status = getHttpStatus(err.typedError);
    log.warn('Request error', { code: err.typedError.code, status, path: err.typedError.path });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  log.error('Unhandled request error', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(apiError(createTypedError({
    code: 'SYSTEM.INTERNAL',
    message: err instanceof Error ? err.message : 'Internal server error',
    retryable: false,
  })));
}

/** Global error handling middleware (body parser failures and the like). */
export function errorHandler(err: unknown, req: ContextRequest, res: Response, _next: NextFunction) {
  if (isHttpError(err)) {
    res.status(err.status).json(apiError(validationError(err.message)));
    return;
  }
  sendError(req, res, err);
}

function isHttpError(err: unknown): err is { status: number; message: string } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}
