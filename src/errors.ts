/**
 * Application error hierarchy.
 * Every error a handler may throw on purpose is an AppError: it carries a
 * stable code, an HTTP status and optional structured details.
 * Anything else reaching the error handler is treated as an internal fault.
 */

import type { ErrorCode } from './types/api.js';
import type { DatasetErrorReason } from './types/models.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed request (bad JSON, wrong field types). */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export interface FieldIssue {
  field: string;
  issue: 'missing' | 'invalid';
}

/** Inquiry form failed field validation. Never logged as a system fault. */
export class InquiryValidationError extends AppError {
  constructor(readonly fields: FieldIssue[]) {
    super(
      'VALIDATION_FAILED',
      `Please check the following fields: ${fields.map((f) => f.field).join(', ')}`,
      422,
      { fields }
    );
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

/** Event is not legal in the conversation's current state. */
export class TransitionError extends AppError {
  constructor(readonly event: string, readonly state: string) {
    super(
      'TRANSITION_NOT_ALLOWED',
      `"${event}" is not available at this step of the conversation`,
      409,
      { event, state }
    );
  }
}

export class DuplicateSubmissionError extends AppError {
  constructor(inquiryId: string | null) {
    super(
      'DUPLICATE_SUBMISSION',
      'This inquiry has already been submitted. Start a new conversation to send another one.',
      409,
      inquiryId ? { inquiryId } : undefined
    );
  }
}

export class RateLimitError extends AppError {
  constructor(readonly retryAfter: number) {
    super('RATE_LIMITED', 'Too many requests, please slow down', 429, { retryAfter });
  }
}

/** Load-time failure of the knowledge-base source. */
export class DatasetError extends AppError {
  constructor(
    readonly reason: DatasetErrorReason,
    message: string,
    readonly row?: number
  ) {
    super('DATASET_ERROR', message, 503, row === undefined ? { reason } : { reason, row });
  }
}

/** The search path has no usable dataset (never loaded, or load failed). */
export class DatasetUnavailableError extends AppError {
  constructor() {
    super('SERVICE_UNAVAILABLE', 'The knowledge base is not available right now', 503);
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}
