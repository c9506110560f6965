/**
 * Response and body helpers shared by the endpoint handlers.
 */

import type { HandlerContext } from '../middleware/pipeline.js';
import { ValidationError } from '../errors.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { ...JSON_HEADERS, ...headers },
  });
}

/** The body validateBody stored on the context. */
export function requireBody(ctx: HandlerContext): Record<string, unknown> {
  if (!ctx.body) throw new ValidationError('Request body is required');
  return ctx.body;
}

export function readString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string') throw new ValidationError(`${field} must be a string`);
  return value;
}

export function readOptionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  return readString(body, field);
}

export function readNumber(body: Record<string, unknown>, field: string): number {
  const value = body[field];
  if (typeof value !== 'number') throw new ValidationError(`${field} must be a number`);
  return value;
}
