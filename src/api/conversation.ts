/**
 * Conversation endpoints.
 * GET  /api/v1/conversation/welcome        start a conversation
 * POST /api/v1/conversation/welcome        start one, optionally under a given id
 * POST /api/v1/conversation/category       pick a topic
 * POST /api/v1/conversation/faq            pick a question from the topic
 * POST /api/v1/conversation/query          free-text question inside the conversation
 * POST /api/v1/conversation/inquiry/start  open the inquiry form
 * POST /api/v1/conversation/inquiry        submit the inquiry form
 * POST /api/v1/conversation/restart        start over after a submitted inquiry
 *
 * Every endpoint answers with `{conversationId, state, directive}`. An error
 * directive keeps that shape and sets the HTTP status from its code.
 */

import { isRecord, pipeline, validateBody } from '../middleware/index.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { ErrorCode } from '../types/api.js';
import type { ConversationEvent, ConversationOutcome } from '../types/conversation.js';
import { ValidationError } from '../errors.js';
import { json, readNumber, readOptionalString, readString, requireBody } from './respond.js';

const conversationId = { type: 'string', required: true, minLength: 1, maxLength: 100 } as const;

const schemas = {
  welcome: {
    conversationId: { type: 'string', required: false, minLength: 1, maxLength: 100 },
  },
  category: {
    conversationId,
    categoryId: { type: 'string', required: true, minLength: 1, maxLength: 100 },
  },
  faq: {
    conversationId,
    faqId: { type: 'number', required: true, integer: true, min: 1 },
  },
  query: {
    conversationId,
    question: { type: 'string', required: true, maxLength: 1000 },
  },
  conversationOnly: { conversationId },
  inquiry: {
    conversationId,
    formData: { type: 'object', required: true },
  },
} satisfies Record<string, BodySchema>;

const DIRECTIVE_ERROR_STATUS: Partial<Record<ErrorCode, number>> = {
  NOT_FOUND: 404,
  TRANSITION_NOT_ALLOWED: 409,
  DUPLICATE_SUBMISSION: 409,
  VALIDATION_FAILED: 422,
};

export function statusForOutcome(outcome: ConversationOutcome): number {
  if (outcome.directive.kind !== 'error') return 200;
  return DIRECTIVE_ERROR_STATUS[outcome.directive.error.code] ?? 400;
}

export function createConversationHandlers(container: Container) {
  const base = [
    container.logging,
    container.errorHandler,
    container.rateLimit.conversation,
  ];

  /** Build a handler that turns the validated body into one conversation event. */
  function eventHandler(
    schema: BodySchema,
    toEvent: (body: Record<string, unknown>) => ConversationEvent,
    options?: { allowEmpty?: boolean }
  ): Handler {
    return pipeline(...base, validateBody(schema, options))(async (_req, ctx) => {
      const body = requireBody(ctx);
      const id = readOptionalString(body, 'conversationId') ?? null;
      return respond(ctx, id, toEvent(body));
    });
  }

  async function respond(
    ctx: HandlerContext,
    id: string | null,
    event: ConversationEvent
  ): Promise<Response> {
    ctx.conversationId = id;
    const outcome = await container.conversationService.dispatch(id, event);
    ctx.conversationId = outcome.conversationId;
    return json(outcome, statusForOutcome(outcome));
  }

  const welcomeGet: Handler = pipeline(...base)(async (_req, ctx) =>
    respond(ctx, null, { type: 'welcome' })
  );

  const welcomePost = eventHandler(schemas.welcome, () => ({ type: 'welcome' }), {
    allowEmpty: true,
  });

  const selectCategory = eventHandler(schemas.category, (body) => ({
    type: 'selectCategory',
    categoryId: readString(body, 'categoryId'),
  }));

  const selectFaq = eventHandler(schemas.faq, (body) => ({
    type: 'selectFaq',
    faqId: readNumber(body, 'faqId'),
  }));

  const query = eventHandler(schemas.query, (body) => ({
    type: 'freeTextQuery',
    question: readString(body, 'question'),
  }));

  const startInquiry = eventHandler(schemas.conversationOnly, () => ({ type: 'startInquiry' }));

  const submitInquiry = eventHandler(schemas.inquiry, (body) => {
    const form = body.formData;
    if (!isRecord(form)) throw new ValidationError('formData must be an object');
    return { type: 'submitInquiry', form };
  });

  const restart = eventHandler(schemas.conversationOnly, () => ({ type: 'restart' }));

  return {
    welcomeGet,
    welcomePost,
    selectCategory,
    selectFaq,
    query,
    startInquiry,
    submitInquiry,
    restart,
  };
}
