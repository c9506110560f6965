/**
 * Request logging middleware.
 * One RequestLogEvent per request, tagged with the request id and, once the
 * handler has resolved one, the conversation id. The level follows the
 * status (5xx error, 4xx warn, otherwise info). A handler that throws past
 * the error handler is recorded as a 500 and the error is re-thrown.
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { HandlerContext, Middleware } from './pipeline.js';

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next) => async (req, ctx) => {
    const startedAt = performance.now();
    const record = (status: number, fields?: Record<string, unknown>): void => {
      logProvider.log(requestEvent(req, ctx, status, Math.round(performance.now() - startedAt), fields));
    };

    let response: Response;
    try {
      response = await next(req, ctx);
    } catch (err) {
      record(500, { error: err instanceof Error ? err.message : String(err) });
      throw err;
    }
    record(response.status);
    return response;
  };
}

function requestEvent(
  req: Request,
  ctx: HandlerContext,
  status: number,
  durationMs: number,
  fields?: Record<string, unknown>
): RequestLogEvent {
  const path = new URL(req.url).pathname;
  return {
    level: levelFor(status),
    message: `${req.method} ${path} → ${status} (${durationMs}ms)`,
    method: req.method,
    path,
    status,
    durationMs,
    requestId: ctx.requestId,
    ...(ctx.conversationId ? { conversationId: ctx.conversationId } : {}),
    ...(fields ? { fields } : {}),
  };
}

function levelFor(status: number): LogLevel {
  if (status >= 500) return 'error';
  return status >= 400 ? 'warn' : 'info';
}
