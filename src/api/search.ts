/**
 * Search endpoint.
 * POST /api/v1/search free-text question against the knowledge base
 */

import { pipeline, validateBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { json, readOptionalString, readString, requireBody } from './respond.js';

const searchSchema: BodySchema = {
  question: { type: 'string', required: true, maxLength: 1000 },
  category: { type: 'string', required: false, maxLength: 100 },
  conversationId: { type: 'string', required: false, maxLength: 100 },
};

export function createSearchHandlers(container: Container) {
  const search: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.search,
    validateBody(searchSchema)
  )(async (_req, ctx) => {
    const body = requireBody(ctx);
    const conversationId = readOptionalString(body, 'conversationId');
    ctx.conversationId = conversationId ?? null;

    const result = await container.searchService.search({
      question: readString(body, 'question'),
      category: readOptionalString(body, 'category'),
      conversationId,
    });

    return json(result);
  });

  return { search };
}
