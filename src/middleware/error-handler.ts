/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * Client errors (4xx AppErrors) go back as-is. Server-side failures (5xx and
 * anything that is not an AppError) are logged with a correlation id; the
 * response keeps only the error code, a generic message for the status, the
 * fallback message and that id. Messages and details stay in the log.
 */

import { AppError, RateLimitError } from '../errors.js';
import type { Handler, Middleware } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IIdGenerator } from '../providers/IIdGenerator.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export const FALLBACK_MESSAGE =
  'Sorry, something went wrong on our side. Please try again, or send us an inquiry if the problem continues.';

const SERVER_MESSAGES: Record<number, string> = {
  503: 'The service is temporarily unavailable',
};
const DEFAULT_SERVER_MESSAGE = 'An unexpected error occurred';

export function createErrorHandler(
  logProvider: ILogProvider,
  ids: Pick<IIdGenerator, 'correlationId'>
): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      try {
        return await next(req, ctx);
      } catch (err) {
        const known = err instanceof AppError ? err : null;
        const status = known?.statusCode ?? 500;
        const headers: Record<string, string> = { ...JSON_HEADERS };

        if (err instanceof RateLimitError) {
          headers['Retry-After'] = String(err.retryAfter);
        }

        if (known && status < 500) {
          return json(
            {
              error: {
                code: known.code,
                message: known.message,
                ...(known.details ? { details: known.details } : {}),
              },
            },
            status,
            headers
          );
        }

        const correlationId = ids.correlationId();
        logProvider.error('Request failed', {
          correlationId,
          requestId: ctx.requestId,
          path: new URL(req.url).pathname,
          ...(known ? { code: known.code } : {}),
          error: err instanceof Error ? err.message : String(err),
          ...(known?.details ? { details: known.details } : {}),
          ...(err instanceof Error && err.stack ? { stack: err.stack } : {}),
        });

        return json(
          {
            error: {
              code: known?.code ?? 'INTERNAL_ERROR',
              message: SERVER_MESSAGES[status] ?? DEFAULT_SERVER_MESSAGE,
              fallbackMessage: FALLBACK_MESSAGE,
              correlationId,
            },
          },
          status,
          headers
        );
      }
    };
  };
}

function json(body: ApiErrorResponse, status: number, headers: Record<string, string>): Response {
  return new Response(JSON.stringify(body), { status, headers });
}
