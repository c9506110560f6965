/**
 * Records every notification event in the `interaction_events` table,
 * giving operators a queryable history of searches, FAQ picks, inquiries
 * and feedback.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { INotificationSink, NotificationEvent } from './INotificationSink.js';
import type { InteractionEventInsert } from '../types/database.js';

const TABLE = 'interaction_events';

export class SupabaseNotificationSink implements INotificationSink {
  constructor(private readonly db: SupabaseClient) {}

  async notify(event: NotificationEvent): Promise<void> {
    const { error } = await this.db.from(TABLE).insert(toRow(event));
    if (error) throw new Error(`Failed to record ${event.type} event: ${error.message}`);
  }
}

export function toRow(event: NotificationEvent): InteractionEventInsert {
  switch (event.type) {
    case 'search':
      return {
        event_type: event.type,
        conversation_id: event.conversationId,
        payload: {
          question: event.question,
          answer: event.answer,
          confidence: event.confidence,
          category: event.category,
        },
      };
    case 'faq_selected':
      return {
        event_type: event.type,
        conversation_id: event.conversationId,
        payload: { faq_id: event.faqId, question: event.question, category: event.category },
      };
    case 'inquiry_submitted': {
      const { inquiry } = event;
      return {
        event_type: event.type,
        conversation_id: inquiry.conversationId,
        payload: {
          inquiry_id: inquiry.inquiryId,
          name: inquiry.name,
          company: inquiry.company,
          email: inquiry.email,
          message: inquiry.message,
          submitted_at: inquiry.submittedAt.toISOString(),
        },
      };
    }
    case 'feedback': {
      const { feedback } = event;
      return {
        event_type: event.type,
        conversation_id: feedback.conversationId,
        payload: {
          rating: feedback.rating,
          comment: feedback.comment,
          timestamp: feedback.timestamp.toISOString(),
          context: feedback.context,
        },
      };
    }
    case 'dataset_reloaded':
      return {
        event_type: event.type,
        conversation_id: null,
        payload: { entries: event.entries, success: event.success, error: event.error ?? null },
      };
  }
}
