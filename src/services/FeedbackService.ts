/**
 * Visitor feedback on answers.
 * Every submission is an independent record; nothing is deduplicated.
 */

import type { ISessionStore } from '../stores/ISessionStore.js';
import type { NotificationDispatcher } from '../providers/NotificationDispatcher.js';
import type { FeedbackRequest } from '../types/api.js';
import type { FeedbackRecord, Rating } from '../types/models.js';
import { ValidationError } from '../errors.js';

export const MAX_COMMENT_LENGTH = 2000;

const RATINGS: readonly Rating[] = ['positive', 'negative'];

export class FeedbackService {
  constructor(
    private readonly sessions: ISessionStore,
    private readonly notifications: NotificationDispatcher,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async submit(input: FeedbackRequest): Promise<void> {
    const conversationId = input.conversationId.trim();
    if (!conversationId) {
      throw new ValidationError('conversationId is required', { field: 'conversationId' });
    }
    if (!isRating(input.rating)) {
      throw new ValidationError(`rating must be one of: ${RATINGS.join(', ')}`, { field: 'rating' });
    }

    const comment = input.comment?.trim() || null;
    if (comment && comment.length > MAX_COMMENT_LENGTH) {
      throw new ValidationError(`comment must be at most ${MAX_COMMENT_LENGTH} characters`, {
        field: 'comment',
      });
    }

    const session = await this.sessions.get(conversationId);
    const record: FeedbackRecord = {
      conversationId,
      rating: input.rating,
      comment,
      timestamp: this.clock(),
      context: session
        ? {
            state: session.state,
            category: session.selectedCategory,
            interactionCount: session.interactionCount,
          }
        : null,
    };

    this.notifications.dispatch({ type: 'feedback', feedback: record });
  }
}

function isRating(value: string): value is Rating {
  return RATINGS.some((r) => r === value);
}
