/**
 * API types: shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type { CategorySummary, CitationSet, LoadFailureReason, Rating } from './models.js';
import type { InquiryFormData } from './conversation.js';

// ── Requests ──

export interface SearchRequest {
  question: string;
  category?: string;
  conversationId?: string;
}

export interface FeedbackRequest {
  conversationId: string;
  rating: Rating;
  comment?: string;
}

export interface CategorySelectionRequest {
  conversationId: string;
  categoryId: string;
}

export interface FaqSelectionRequest {
  conversationId: string;
  faqId: number;
}

export interface InquirySubmissionRequest {
  conversationId: string;
  formData: InquiryFormData;
}

// ── Responses ──

export interface MatchSummary {
  entryId: number;
  question: string;
  score: number;
  matchedTerms: string[];
}

export interface SearchResponse {
  answer: string;
  /** Top score rounded to two decimals; 0 when nothing matched. */
  confidence: number;
  /** The stored question that produced the answer. */
  question: string | null;
  category: string | null;
  reference: string | null;
  citations: CitationSet;
  matches: MatchSummary[];
}

export interface HealthResponse {
  status: 'ok' | 'degraded';
  version: string;
  entries: number;
  loadedAt: string | null;
}

export interface DatasetStatusResponse {
  /** Source name without its location. */
  source: string;
  loaded: boolean;
  entries: number;
  loadedAt: string | null;
  /** Reason of the last failed load; the full message is only logged. */
  lastError: LoadFailureReason | null;
  categories: CategorySummary[];
}

export interface ReloadResponse {
  success: boolean;
  entries: number;
  loadedAt: string | null;
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'VALIDATION_FAILED'
  | 'NOT_FOUND'
  | 'TRANSITION_NOT_ALLOWED'
  | 'DUPLICATE_SUBMISSION'
  | 'RATE_LIMITED'
  | 'DATASET_ERROR'
  | 'SERVICE_UNAVAILABLE'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    /** Friendly text a client can show when `message` is not meant for visitors. */
    fallbackMessage?: string;
    /** Present when the failure was logged server-side. */
    correlationId?: string;
    details?: Record<string, unknown>;
  };
}
