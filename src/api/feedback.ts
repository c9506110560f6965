/**
 * Feedback endpoint.
 * POST /api/v1/feedback rate an answer; 204 on success
 */

import { pipeline, validateBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { Rating } from '../types/models.js';
import { ValidationError } from '../errors.js';
import { MAX_COMMENT_LENGTH } from '../services/FeedbackService.js';
import { readOptionalString, readString, requireBody } from './respond.js';

const feedbackSchema: BodySchema = {
  conversationId: { type: 'string', required: true, minLength: 1, maxLength: 100 },
  rating: { type: 'string', required: true, enum: ['positive', 'negative'] },
  comment: { type: 'string', required: false, maxLength: MAX_COMMENT_LENGTH },
};

export function createFeedbackHandlers(container: Container) {
  const submit: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.feedback,
    validateBody(feedbackSchema)
  )(async (_req, ctx) => {
    const body = requireBody(ctx);
    const conversationId = readString(body, 'conversationId');
    ctx.conversationId = conversationId;

    await container.feedbackService.submit({
      conversationId,
      rating: readRating(body.rating),
      comment: readOptionalString(body, 'comment'),
    });

    return new Response(null, { status: 204 });
  });

  return { submit };
}

function readRating(value: unknown): Rating {
  if (value === 'positive' || value === 'negative') return value;
  throw new ValidationError('rating must be one of: positive, negative');
}
