/**
 * Body validation middleware.
 * Parses the JSON body, checks it against a schema and stores it on the
 * context for the handler. Failures become a 400 with field-level errors.
 */

import type { BodySchema, FieldSchema } from '../types/common.js';
import type { Handler, Middleware } from './pipeline.js';
import { ValidationError } from '../errors.js';

export interface ValidateBodyOptions {
  /** Treat an empty body as `{}`. Default: false. */
  allowEmpty?: boolean;
}

export function validateBody(schema: BodySchema, options: ValidateBodyOptions = {}): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const text = await req.text();
      let parsed: unknown;

      if (options.allowEmpty && text.trim() === '') {
        parsed = {};
      } else {
        try {
          parsed = JSON.parse(text);
        } catch {
          throw new ValidationError('Request body must be valid JSON');
        }
      }

      if (!isRecord(parsed)) {
        throw new ValidationError('Request body must be a JSON object');
      }

      const errors = validateFields(parsed, schema);

      if (errors.length > 0) {
        throw new ValidationError(errors.join('; '), { fields: errors });
      }

      ctx.body = parsed;
      return next(req, ctx);
    };
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateFields(
  body: Record<string, unknown>,
  schema: BodySchema
): string[] {
  const errors: string[] = [];

  for (const [field, fieldSchema] of Object.entries(schema)) {
    const value = body[field];

    // Required check
    if (fieldSchema.required && (value === undefined || value === null)) {
      errors.push(`${field} is required`);
      continue;
    }

    // Skip optional missing fields
    if (value === undefined || value === null) {
      continue;
    }

    const typeError = checkType(field, value, fieldSchema);
    if (typeError) {
      errors.push(typeError);
      continue;
    }

    errors.push(...checkConstraints(field, value, fieldSchema));
  }

  return errors;
}

function checkType(
  field: string,
  value: unknown,
  schema: FieldSchema
): string | null {
  switch (schema.type) {
    case 'string':
      if (typeof value !== 'string') return `${field} must be a string`;
      break;
    case 'number':
      if (typeof value !== 'number' || !Number.isFinite(value)) return `${field} must be a number`;
      break;
    case 'boolean':
      if (typeof value !== 'boolean') return `${field} must be a boolean`;
      break;
    case 'array':
      if (!Array.isArray(value)) return `${field} must be an array`;
      break;
    case 'object':
      if (!isRecord(value)) return `${field} must be an object`;
      break;
  }
  return null;
}

function checkConstraints(
  field: string,
  value: unknown,
  schema: FieldSchema
): string[] {
  const errors: string[] = [];

  if (schema.type === 'string' && typeof value === 'string') {
    if (schema.minLength !== undefined && value.trim().length < schema.minLength) {
      errors.push(
        schema.minLength === 1
          ? `${field} must not be empty`
          : `${field} must be at least ${schema.minLength} characters`
      );
    }
    if (schema.maxLength !== undefined && value.length > schema.maxLength) {
      errors.push(`${field} must be ${schema.maxLength} characters or less`);
    }
    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${field} must be one of: ${schema.enum.join(', ')}`);
    }
  }

  if (schema.type === 'number' && typeof value === 'number') {
    if (schema.integer && !Number.isInteger(value)) {
      errors.push(`${field} must be an integer`);
    }
    if (schema.min !== undefined && value < schema.min) {
      errors.push(`${field} must be at least ${schema.min}`);
    }
    if (schema.max !== undefined && value > schema.max) {
      errors.push(`${field} must be at most ${schema.max}`);
    }
  }

  return errors;
}
