/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure the service can report is a TypedError with a namespaced
 * code. Inside the service they travel as MetadataError subclasses so that
 * the HTTP layer can map them onto a status without string matching on
 * messages.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'DOCUMENT'
  | 'STORE'
  | 'VALIDATION'
  | 'CONFIG'
  | 'SYSTEM';

/** Typed suggested fix that a client can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "STORE.NOT_FOUND"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Store path the failure relates to, if any. */
  path?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  path?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    path: params.path,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'STORE.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    path: resourceId,
    retryable: false,
  });
}

/**
 * Backend failures keep the backend's own status code. 429 and 5xx are
 * retryable by the caller; the service itself never retries.
 */
export function backendError(path: string, statusCode: number, message: string): TypedError {
  const retryable = statusCode === 429 || statusCode >= 500;
  return createTypedError({
    code: 'STORE.BACKEND',
    message,
    path,
    retryable,
    details: { statusCode },
    suggestedFixes: retryable
      ? [{ type: 'WAIT_AND_RETRY', params: { delayMs: 1000 }, description: 'Transient backend failure.' }]
      : [],
  });
}

// --- Error classes thrown through the service ---

/** Base class for every failure that carries a TypedError. */
export class MetadataError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'MetadataError';
  }
}

/** Malformed document (YAML or JSON that does not parse, or a mistyped envelope field). */
export class FormatError extends MetadataError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(createTypedError({
      code: 'DOCUMENT.FORMAT',
      message,
      details,
      suggestedFixes: [{ type: 'FIX_DOCUMENT', params: {}, description: 'Send well-formed YAML (starting with ---) or JSON.' }],
    }));
    this.name = 'FormatError';
  }
}

/** Patch document that is not a flat JSON object. */
export class ParseError extends MetadataError {
  constructor(message: string) {
    super(createTypedError({
      code: 'DOCUMENT.PATCH_PARSE',
      message,
      suggestedFixes: [{ type: 'FIX_PATCH', params: {}, description: 'A patch is a JSON object whose keys are dot-separated paths.' }],
    }));
    this.name = 'ParseError';
  }
}

/** The backend reported a missing path (status 404). */
export class NotFoundError extends MetadataError {
  constructor(public path: string) {
    super(notFoundError('Path', path));
    this.name = 'NotFoundError';
  }
}

/** Any other backend failure; statusCode is the backend's, verbatim. */
export class BackendError extends MetadataError {
  constructor(public path: string, public statusCode: number, message: string) {
    super(backendError(path, statusCode, message));
    this.name = 'BackendError';
  }
}

/** One failed deletion inside a delete-by-query. */
export interface DeleteFailure {
  path: string;
  statusCode: number;
  message: string;
}

/**
 * Delete-by-query attempts every match; failures are collected rather than
 * rolled back. The reported status is the first failure's.
 */
export class BatchDeleteError extends MetadataError {
  constructor(public failures: DeleteFailure[], public attempted: number) {
    super(createTypedError({
      code: 'STORE.BATCH_DELETE',
      message: `${failures.length} of ${attempted} deletions failed`,
      retryable: failures.some((f) => f.statusCode === 429 || f.statusCode >= 500),
      details: { statusCode: failures[0]?.statusCode ?? 500, attempted, failures },
    }));
    this.name = 'BatchDeleteError';
  }
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of the given secrets inside a message with their
 * masked form.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids escaping the secret for a RegExp
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** HTTP status for a typed error. */
export function getHttpStatus(error: TypedError): number {
  if (error.code === 'STORE.BACKEND' || error.code === 'STORE.BATCH_DELETE') {
    const status = error.details?.statusCode;
    return typeof status === 'number' && status >= 400 && status < 600 ? status : 500;
  }
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('DOCUMENT.')) return 400;
  return 500;
}

/** Construct an API error response. */
export function apiError(error: TypedError): { error: TypedError } {
  return { error };
}
