/**
 * Conversation state machine.
 *
 * `transition` is pure: it takes a session and an event and returns the next
 * session, the directive to render and the notifications to send. It never
 * touches a store, a clock or a sink; those arrive through `MachineContext`.
 *
 *   initial ─welcome→ category_selection ─selectCategory→ faq_selection
 *      │                    │                                 │ selectFaq / selectCategory
 *      └──── startInquiry (any non-terminal) ──→ inquiry_form ─submitInquiry→ completed
 *                                                                    │ restart
 *                                                     initial (fresh session, categories listed)
 *
 * `selectCategory` is also accepted in `initial`, where a restart leaves
 * the session with the topic menu already shown.
 *
 * A failed guard yields an error directive and leaves the state as it was.
 */

import type { KnowledgeBaseService } from '../services/KnowledgeBaseService.js';
import type { SearchService } from '../services/SearchService.js';
import type { IIdGenerator } from '../providers/IIdGenerator.js';
import type { NotificationEvent } from '../providers/INotificationSink.js';
import type {
  Affordance,
  ConversationEvent,
  Directive,
  FormField,
  InquiryField,
  InquiryFormData,
} from '../types/conversation.js';
import type { ConversationSession, ConversationState, InquirySubmission } from '../types/models.js';
import type { SearchResponse } from '../types/api.js';
import {
  AppError,
  DuplicateSubmissionError,
  InquiryValidationError,
  NotFoundError,
  TransitionError,
} from '../errors.js';
import type { FieldIssue } from '../errors.js';

export type ConversationKnowledge = Pick<
  KnowledgeBaseService,
  'categories' | 'findCategory' | 'faqsForCategory' | 'findEntry'
>;

export type ConversationSearch = Pick<SearchService, 'answer'>;

export interface MachineSettings {
  /** Search results below this confidence also offer the inquiry form. */
  inquirySuggestionBelow: number;
  /** Shown on the receipt, e.g. "within 1 business day". */
  inquiryResponseTime: string;
  /** Maximum FAQs listed per category. Default: 10. */
  faqLimit?: number;
}

export interface MachineContext {
  knowledge: ConversationKnowledge;
  search: ConversationSearch;
  ids: IIdGenerator;
  now: Date;
  settings: MachineSettings;
}

export interface TransitionResult {
  session: ConversationSession;
  directive: Directive;
  notifications: NotificationEvent[];
}

export const WELCOME_MESSAGE =
  'Hello! I can answer questions about our product and services. Choose a topic below, or type your question.';
export const FORM_MESSAGE =
  'Please fill in the form below and a member of our team will get back to you.';
export const RECEIPT_MESSAGE =
  'Thank you for your inquiry! A member of our team will reply shortly.';

export const INQUIRY_FORM_FIELDS: readonly FormField[] = [
  { name: 'name', label: 'Name', type: 'text', required: true },
  { name: 'company', label: 'Company', type: 'text', required: true },
  { name: 'email', label: 'Email', type: 'email', required: true },
  { name: 'message', label: 'Message', type: 'textarea', required: true },
];

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const DEFAULT_FAQ_LIMIT = 10;

/** A session in `initial`, as created for a new conversation id. */
export function createSession(conversationId: string, now: Date): ConversationSession {
  return {
    conversationId,
    state: 'initial',
    selectedCategory: null,
    selectedFaqId: null,
    interactionCount: 0,
    inquiryId: null,
    createdAt: now,
    lastActivityAt: now,
  };
}

export function isTerminal(state: ConversationState): boolean {
  return state === 'completed';
}

export function transition(
  session: ConversationSession,
  event: ConversationEvent,
  ctx: MachineContext
): TransitionResult {
  if (isTerminal(session.state) && event.type !== 'restart') {
    return reject(
      session,
      event.type === 'submitInquiry'
        ? new DuplicateSubmissionError(session.inquiryId)
        : new TransitionError(event.type, session.state),
      ctx.now
    );
  }

  switch (event.type) {
    case 'welcome':
      return welcome(session, ctx);
    case 'selectCategory':
      return selectCategory(session, event.categoryId, ctx);
    case 'selectFaq':
      return selectFaq(session, event.faqId, ctx);
    case 'freeTextQuery':
      return freeTextQuery(session, event.question, ctx);
    case 'startInquiry':
      return accept(session, 'inquiry_form', ctx.now, {
        kind: 'form',
        message: FORM_MESSAGE,
        fields: [...INQUIRY_FORM_FIELDS],
      });
    case 'submitInquiry':
      return submitInquiry(session, event.form, ctx);
    case 'restart':
      return restart(session, ctx);
    default:
      return assertNever(event);
  }
}

/**
 * Trim and check every inquiry field.
 * Returns the cleaned values, or the list of fields that are missing or invalid.
 */
export function validateInquiry(
  form: InquiryFormData
): { ok: true; values: Record<InquiryField, string> } | { ok: false; issues: FieldIssue[] } {
  const issues: FieldIssue[] = [];
  const values: Record<InquiryField, string> = { name: '', company: '', email: '', message: '' };

  for (const field of INQUIRY_FORM_FIELDS) {
    const raw = form[field.name];
    const value = typeof raw === 'string' ? raw.trim() : '';
    if (raw !== undefined && raw !== null && typeof raw !== 'string') {
      issues.push({ field: field.name, issue: 'invalid' });
    } else if (value.length === 0) {
      issues.push({ field: field.name, issue: 'missing' });
    } else if (field.type === 'email' && !EMAIL_PATTERN.test(value)) {
      issues.push({ field: field.name, issue: 'invalid' });
    }
    values[field.name] = value;
  }

  return issues.length > 0 ? { ok: false, issues } : { ok: true, values };
}

// ── Handlers ──

function welcome(session: ConversationSession, ctx: MachineContext): TransitionResult {
  if (session.state !== 'initial') {
    return reject(session, new TransitionError('welcome', session.state), ctx.now);
  }
  return accept(session, 'category_selection', ctx.now, greeting(ctx));
}

function selectCategory(
  session: ConversationSession,
  categoryId: string,
  ctx: MachineContext
): TransitionResult {
  if (session.state === 'inquiry_form') {
    return reject(session, new TransitionError('selectCategory', session.state), ctx.now);
  }

  const category = ctx.knowledge.findCategory(categoryId);
  if (!category) {
    return reject(session, new NotFoundError(`Category "${categoryId}" was not found`), ctx.now);
  }

  const faqs = ctx.knowledge.faqsForCategory(category.id, ctx.settings.faqLimit ?? DEFAULT_FAQ_LIMIT);
  const intro = category.description ?? `Here are common questions about ${category.label}.`;

  return accept(
    { ...session, selectedCategory: category.id, selectedFaqId: null },
    'faq_selection',
    ctx.now,
    {
      kind: 'faqs',
      message: `${intro}\n\nPick a question below, or type your own.`,
      category,
      faqs: faqs.map((entry) => ({ id: entry.id, question: entry.question })),
      affordances: ['start_inquiry'],
    }
  );
}

function selectFaq(session: ConversationSession, faqId: number, ctx: MachineContext): TransitionResult {
  if (session.state !== 'faq_selection') {
    return reject(session, new TransitionError('selectFaq', session.state), ctx.now);
  }

  const entry = ctx.knowledge.findEntry(faqId);
  if (!entry) {
    return reject(session, new NotFoundError(`FAQ ${faqId} was not found`), ctx.now);
  }

  const category = entry.category ?? session.selectedCategory;
  return accept(
    { ...session, selectedFaqId: entry.id, selectedCategory: category },
    'faq_selection',
    ctx.now,
    {
      kind: 'answer',
      message: entry.answer,
      faqId: entry.id,
      question: entry.question,
      reference: entry.reference,
      affordances: ['more_questions', 'start_inquiry'],
    },
    [
      {
        type: 'faq_selected',
        conversationId: session.conversationId,
        faqId: entry.id,
        question: entry.question,
        category,
      },
    ]
  );
}

function freeTextQuery(
  session: ConversationSession,
  question: string,
  ctx: MachineContext
): TransitionResult {
  const result = answerWithinTopic(question, session.selectedCategory, ctx);
  const affordances: Affordance[] = ['feedback'];
  if (result.confidence < ctx.settings.inquirySuggestionBelow) {
    affordances.push('start_inquiry');
  }

  return accept(
    session,
    session.state,
    ctx.now,
    { kind: 'search', result, affordances },
    [
      {
        type: 'search',
        conversationId: session.conversationId,
        question,
        answer: result.answer,
        confidence: result.confidence,
        category: result.category,
      },
    ]
  );
}

/**
 * Search the selected topic first. A weak answer there gives way to a
 * confident one from the whole knowledge base.
 */
function answerWithinTopic(question: string, topic: string | null, ctx: MachineContext): SearchResponse {
  const scoped = ctx.search.answer(question, topic);
  const confident = ctx.settings.inquirySuggestionBelow;
  if (topic === null || scoped.confidence >= confident) return scoped;

  const anywhere = ctx.search.answer(question, null);
  return anywhere.confidence >= confident && anywhere.confidence > scoped.confidence ? anywhere : scoped;
}

function submitInquiry(
  session: ConversationSession,
  form: InquiryFormData,
  ctx: MachineContext
): TransitionResult {
  if (session.state !== 'inquiry_form') {
    return reject(session, new TransitionError('submitInquiry', session.state), ctx.now);
  }

  const validation = validateInquiry(form);
  if (!validation.ok) {
    return reject(session, new InquiryValidationError(validation.issues), ctx.now);
  }

  const inquiryId = ctx.ids.inquiryId(ctx.now);
  const inquiry: InquirySubmission = {
    conversationId: session.conversationId,
    ...validation.values,
    submittedAt: ctx.now,
    inquiryId,
  };

  return accept(
    { ...session, inquiryId },
    'completed',
    ctx.now,
    {
      kind: 'receipt',
      message: RECEIPT_MESSAGE,
      inquiryId,
      estimatedResponseTime: ctx.settings.inquiryResponseTime,
    },
    [{ type: 'inquiry_submitted', inquiry }]
  );
}

/**
 * Discard everything about the finished conversation. The fresh session
 * under the same id stays in `initial`; its topic menu comes with the reply.
 */
function restart(session: ConversationSession, ctx: MachineContext): TransitionResult {
  if (!isTerminal(session.state)) {
    return reject(session, new TransitionError('restart', session.state), ctx.now);
  }
  return accept(createSession(session.conversationId, ctx.now), 'initial', ctx.now, greeting(ctx));
}

// ── Helpers ──

function greeting(ctx: MachineContext): Directive {
  return {
    kind: 'categories',
    message: WELCOME_MESSAGE,
    categories: [...ctx.knowledge.categories()],
  };
}

function accept(
  session: ConversationSession,
  state: ConversationState,
  now: Date,
  directive: Directive,
  notifications: NotificationEvent[] = []
): TransitionResult {
  return {
    session: {
      ...session,
      state,
      interactionCount: session.interactionCount + 1,
      lastActivityAt: now,
    },
    directive,
    notifications,
  };
}

function reject(session: ConversationSession, error: AppError, now: Date): TransitionResult {
  return {
    session: { ...session, lastActivityAt: now },
    directive: toErrorDirective(error),
    notifications: [],
  };
}

export function toErrorDirective(error: AppError): Directive {
  return {
    kind: 'error',
    error: {
      code: error.code,
      message: error.message,
      ...(error.details ? { details: error.details } : {}),
    },
  };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled conversation event: ${JSON.stringify(value)}`);
}
