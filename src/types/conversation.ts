/**
 * Conversation protocol: the closed set of events a visitor can send and
 * the directives the state machine answers with.
 * Clients render directives; they never decide what comes next.
 */

import type { ConversationState, CategorySummary } from './models.js';
import type { ErrorCode, SearchResponse } from './api.js';

// ── Events ──

export type InquiryField = 'name' | 'company' | 'email' | 'message';

/** Raw form input; every field is validated by the state machine. */
export type InquiryFormData = Partial<Record<InquiryField, unknown>>;

export type ConversationEvent =
  | { type: 'welcome' }
  | { type: 'selectCategory'; categoryId: string }
  | { type: 'selectFaq'; faqId: number }
  | { type: 'freeTextQuery'; question: string }
  | { type: 'startInquiry' }
  | { type: 'submitInquiry'; form: InquiryFormData }
  | { type: 'restart' };

// ── Directives ──

export type Affordance = 'more_questions' | 'start_inquiry' | 'feedback';

export interface FaqOption {
  id: number;
  question: string;
}

export interface FormField {
  name: InquiryField;
  label: string;
  type: 'text' | 'email' | 'textarea';
  required: true;
}

export type Directive =
  | { kind: 'categories'; message: string; categories: CategorySummary[] }
  | {
      kind: 'faqs';
      message: string;
      category: CategorySummary;
      faqs: FaqOption[];
      affordances: Affordance[];
    }
  | {
      kind: 'answer';
      message: string;
      faqId: number;
      question: string;
      reference: string | null;
      affordances: Affordance[];
    }
  | { kind: 'search'; result: SearchResponse; affordances: Affordance[] }
  | { kind: 'form'; message: string; fields: FormField[] }
  | { kind: 'receipt'; message: string; inquiryId: string; estimatedResponseTime: string }
  | {
      kind: 'error';
      error: { code: ErrorCode; message: string; details?: Record<string, unknown> };
    };

export interface ConversationOutcome {
  conversationId: string;
  state: ConversationState;
  directive: Directive;
}
