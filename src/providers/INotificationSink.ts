/**
 * Outbound notification contract.
 * The core hands events to a sink and moves on; delivery is the sink's
 * problem and its outcome never feeds back into a conversation.
 */

import type { FeedbackRecord, InquirySubmission } from '../types/models.js';

export type NotificationEvent =
  | {
      type: 'search';
      conversationId: string | null;
      question: string;
      answer: string;
      confidence: number;
      category: string | null;
    }
  | {
      type: 'faq_selected';
      conversationId: string;
      faqId: number;
      question: string;
      category: string | null;
    }
  | { type: 'inquiry_submitted'; inquiry: InquirySubmission }
  | { type: 'feedback'; feedback: FeedbackRecord }
  | { type: 'dataset_reloaded'; entries: number; success: boolean; error?: string };

export type NotificationEventType = NotificationEvent['type'];

export interface INotificationSink {
  /** Deliver one event. May reject; callers never await it on a request path. */
  notify(event: NotificationEvent): Promise<void>;
}
