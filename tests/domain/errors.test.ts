import {
  BackendError,
  BatchDeleteError,
  FormatError,
  NotFoundError,
  ParseError,
  apiError,
  backendError,
  createTypedError,
  getHttpStatus,
  maskSecret,
  maskSecretsInMessage,
  notFoundError,
  validationError,
} from '../../src/domain/errors';

describe('Typed Error Model', () => {
  test('createTypedError produces complete error object', () => {
    const error = createTypedError({
      code: 'TEST.ERROR',
      message: 'test error',
      retryable: true,
      details: { key: 'value' },
      suggestedFixes: [{ type: 'FIX', params: {} }],
    });

    expect(error.code).toBe('TEST.ERROR');
    expect(error.message).toBe('test error');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ key: 'value' });
    expect(error.suggestedFixes).toHaveLength(1);
  });

  test('defaults retryable to false', () => {
    const error = createTypedError({ code: 'TEST', message: 'test' });
    expect(error.retryable).toBe(false);
    expect(error.suggestedFixes).toEqual([]);
  });

  test('validationError factory', () => {
    const error = validationError('bad input');
    expect(error.code).toBe('VALIDATION.SCHEMA');
    expect(error.retryable).toBe(false);
  });

  test('notFoundError factory', () => {
    const error = notFoundError('Path', '/run/p/u1');
    expect(error.code).toBe('STORE.NOT_FOUND');
    expect(error.message).toBe('Path not found: /run/p/u1');
    expect(error.path).toBe('/run/p/u1');
  });

  test('backendError is retryable for throttling and server errors', () => {
    expect(backendError('/p', 429, 'slow').retryable).toBe(true);
    expect(backendError('/p', 503, 'down').retryable).toBe(true);
    expect(backendError('/p', 403, 'denied').retryable).toBe(false);
    expect(backendError('/p', 503, 'down').suggestedFixes[0].type).toBe('WAIT_AND_RETRY');
  });

  test('apiError wraps the typed error', () => {
    const error = validationError('bad');
    expect(apiError(error)).toEqual({ error });
  });
});

describe('Error classes', () => {
  test('carry their typed error', () => {
    expect(new FormatError('bad yaml').typedError.code).toBe('DOCUMENT.FORMAT');
    expect(new ParseError('bad patch').typedError.code).toBe('DOCUMENT.PATCH_PARSE');
    expect(new NotFoundError('/run/p/u1').path).toBe('/run/p/u1');

    const backend = new BackendError('/run/p/u1', 409, 'conflict');
    expect(backend.statusCode).toBe(409);
    expect(backend.message).toBe('conflict');
    expect(backend).toBeInstanceOf(Error);
  });

  test('BatchDeleteError summarizes failures', () => {
    const error = new BatchDeleteError(
      [
        { path: '/run/p/a', statusCode: 403, message: 'denied' },
        { path: '/run/p/b', statusCode: 503, message: 'down' },
      ],
      5,
    );
    expect(error.message).toBe('2 of 5 deletions failed');
    expect(error.typedError.retryable).toBe(true);
    expect(error.typedError.details?.statusCode).toBe(403);
  });
});

describe('getHttpStatus', () => {
  test('maps codes onto statuses', () => {
    expect(getHttpStatus(new NotFoundError('/x').typedError)).toBe(404);
    expect(getHttpStatus(new FormatError('x').typedError)).toBe(400);
    expect(getHttpStatus(new ParseError('x').typedError)).toBe(400);
    expect(getHttpStatus(validationError('x'))).toBe(400);
    expect(getHttpStatus(createTypedError({ code: 'SYSTEM.INTERNAL', message: 'x' }))).toBe(500);
  });

  test('passes backend statuses through', () => {
    expect(getHttpStatus(new BackendError('/x', 409, 'conflict').typedError)).toBe(409);
    expect(getHttpStatus(new BackendError('/x', 200, 'odd').typedError)).toBe(500);
    expect(
      getHttpStatus(new BatchDeleteError([{ path: '/x', statusCode: 502, message: 'bad gateway' }], 1).typedError),
    ).toBe(502);
  });
});

describe('Secret masking', () => {
  test('keeps the last four characters', () => {
    expect(maskSecret('test-secret-key')).toBe('***********-key');
    expect(maskSecret('short')).toBe('****');
  });

  test('masks secrets inside messages', () => {
    expect(maskSecretsInMessage('key test-secret-key rejected', ['test-secret-key'])).toBe(
      'key ***********-key rejected',
    );
  });
});
