import { describe, it, expect, beforeEach } from 'vitest';
import { createErrorHandler, FALLBACK_MESSAGE } from '../../src/middleware/error-handler.js';
import { createContext } from '../../src/middleware/pipeline.js';
import {
  DatasetError,
  DatasetUnavailableError,
  DuplicateSubmissionError,
  InquiryValidationError,
  NotFoundError,
  RateLimitError,
  ValidationError,
} from '../../src/errors.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { SequentialIdGenerator } from '../mocks/SequentialIdGenerator.js';
import { readError } from '../mocks/http.js';
import type { Handler, Middleware } from '../../src/middleware/pipeline.js';

describe('errorHandler', () => {
  const req = new Request('http://test/api/v1/search');
  let logProvider: ConsoleLogProvider;
  let errorHandler: Middleware;

  function throwing(err: unknown): Handler {
    return async () => {
      throw err;
    };
  }

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    errorHandler = createErrorHandler(logProvider, new SequentialIdGenerator());
  });

  it('should pass through successful responses', async () => {
    const handler: Handler = async () =>
      new Response(JSON.stringify({ ok: true }), { status: 200 });

    const res = await errorHandler(handler)(req, createContext('req_1'));

    expect(res.status).toBe(200);
    expect(logProvider.events).toHaveLength(0);
  });

  it('should map NotFoundError to 404', async () => {
    const res = await errorHandler(throwing(new NotFoundError('Category "x" was not found')))(
      req,
      createContext('req_1')
    );
    const body = await readError(res);

    expect(res.status).toBe(404);
    expect(body).toEqual({ error: { code: 'NOT_FOUND', message: 'Category "x" was not found' } });
  });

  it('should map ValidationError to 400 with details', async () => {
    const res = await errorHandler(
      throwing(new ValidationError('question is required', { fields: ['question is required'] }))
    )(req, createContext('req_1'));
    const body = await readError(res);

    expect(res.status).toBe(400);
    expect(body.error.code).toBe('INVALID_REQUEST');
    expect(body.error.details).toEqual({ fields: ['question is required'] });
  });

  it('should map InquiryValidationError to 422 without logging', async () => {
    const res = await errorHandler(
      throwing(new InquiryValidationError([{ field: 'email', issue: 'invalid' }]))
    )(req, createContext('req_1'));
    const body = await readError(res);

    expect(res.status).toBe(422);
    expect(body.error.code).toBe('VALIDATION_FAILED');
    expect(body.error.message).toBe('Please check the following fields: email');
    expect(logProvider.events).toHaveLength(0);
  });

  it('should map DuplicateSubmissionError to 409', async () => {
    const res = await errorHandler(throwing(new DuplicateSubmissionError('INQ-0001')))(
      req,
      createContext('req_1')
    );
    const body = await readError(res);

    expect(res.status).toBe(409);
    expect(body.error.details).toEqual({ inquiryId: 'INQ-0001' });
  });

  it('should map RateLimitError to 429 with Retry-After', async () => {
    const res = await errorHandler(throwing(new RateLimitError(30)))(req, createContext('req_1'));
    const body = await readError(res);

    expect(res.status).toBe(429);
    expect(body.error.code).toBe('RATE_LIMITED');
    expect(body.error.details?.retryAfter).toBe(30);
    expect(res.headers.get('Retry-After')).toBe('30');
  });

  it('should give 5xx AppErrors a correlation id and a fallback message', async () => {
    const res = await errorHandler(throwing(new DatasetUnavailableError()))(
      req,
      createContext('req_7')
    );
    const body = await readError(res);

    expect(res.status).toBe(503);
    expect(body).toEqual({
      error: {
        code: 'SERVICE_UNAVAILABLE',
        message: 'The service is temporarily unavailable',
        fallbackMessage: FALLBACK_MESSAGE,
        correlationId: 'ERR_00000001',
      },
    });
    expect(logProvider.events[0]).toMatchObject({
      level: 'error',
      message: 'Request failed',
      fields: { correlationId: 'ERR_00000001', requestId: 'req_7', path: '/api/v1/search' },
    });
  });

  it('should keep the message and details of a 5xx AppError in the log only', async () => {
    const failure = new DatasetError(
      'Unreadable',
      'Cannot read dataset at /srv/app/data/qa_data.csv: ENOENT: no such file or directory'
    );

    const res = await errorHandler(throwing(failure))(req, createContext('req_3'));
    const body = await readError(res);

    expect(res.status).toBe(503);
    expect(body).toEqual({
      error: {
        code: 'DATASET_ERROR',
        message: 'The service is temporarily unavailable',
        fallbackMessage: FALLBACK_MESSAGE,
        correlationId: 'ERR_00000001',
      },
    });
    expect(logProvider.events[0].fields).toMatchObject({
      correlationId: 'ERR_00000001',
      code: 'DATASET_ERROR',
      error: 'Cannot read dataset at /srv/app/data/qa_data.csv: ENOENT: no such file or directory',
      details: { reason: 'Unreadable' },
    });
  });

  it('should map unknown errors to 500 without exposing internals', async () => {
    const res = await errorHandler(throwing(new Error('secret database error with credentials')))(
      req,
      createContext('req_1')
    );
    const body = await readError(res);

    expect(res.status).toBe(500);
    expect(body.error.code).toBe('INTERNAL_ERROR');
    expect(body.error.message).toBe('An unexpected error occurred');
    expect(body.error.correlationId).toBe('ERR_00000001');
    expect(logProvider.events[0].fields?.error).toBe('secret database error with credentials');
  });

  it('should log thrown non-Error values as strings', async () => {
    await errorHandler(throwing('plain failure'))(req, createContext('req_1'));

    expect(logProvider.events[0].fields).toEqual({
      correlationId: 'ERR_00000001',
      requestId: 'req_1',
      path: '/api/v1/search',
      error: 'plain failure',
    });
  });

  it('should set Content-Type to application/json', async () => {
    const res = await errorHandler(throwing(new NotFoundError('gone')))(req, createContext('req_1'));

    expect(res.headers.get('Content-Type')).toBe('application/json');
  });
});
