/**
 * Posts interaction summaries to a Slack incoming webhook.
 * Positive feedback is not forwarded; everything else produces one message.
 */

import type { INotificationSink, NotificationEvent } from './INotificationSink.js';

export interface SlackNotificationSinkOptions {
  webhookUrl: string;
  /** Injected for tests. Default: global fetch. */
  fetchFn?: typeof fetch;
}

const PREVIEW_LENGTH = 100;

export class SlackNotificationSink implements INotificationSink {
  private readonly webhookUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(options: SlackNotificationSinkOptions) {
    this.webhookUrl = options.webhookUrl;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async notify(event: NotificationEvent): Promise<void> {
    const text = formatSlackMessage(event);
    if (text === null) return;

    const response = await this.fetchFn(this.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text }),
    });

    if (!response.ok) {
      throw new Error(`Slack webhook returned HTTP ${response.status}`);
    }
  }
}

/** Message text for an event, or null when the event is not forwarded. */
export function formatSlackMessage(event: NotificationEvent): string | null {
  switch (event.type) {
    case 'search':
      return (
        `:mag: Search (confidence ${event.confidence.toFixed(2)}): ${event.question}\n` +
        `> ${preview(event.answer)}`
      );
    case 'faq_selected':
      return `:bookmark: FAQ #${event.faqId} selected in ${event.category ?? 'uncategorized'}: ${event.question}`;
    case 'inquiry_submitted': {
      const { inquiry } = event;
      return (
        `:incoming_envelope: New inquiry ${inquiry.inquiryId} from ${inquiry.name} ` +
        `(${inquiry.company}) <${inquiry.email}>\n> ${preview(inquiry.message)}`
      );
    }
    case 'feedback': {
      const { feedback } = event;
      if (feedback.rating === 'positive') return null;
      return (
        `:warning: Negative feedback on conversation ${feedback.conversationId}` +
        (feedback.comment ? `: ${preview(feedback.comment)}` : '')
      );
    }
    case 'dataset_reloaded':
      return event.success
        ? `:books: Knowledge base reloaded (${event.entries} entries)`
        : `:x: Knowledge base reload failed: ${event.error ?? 'unknown error'}`;
  }
}

function preview(text: string): string {
  const chars = Array.from(text);
  return chars.length > PREVIEW_LENGTH ? `${chars.slice(0, PREVIEW_LENGTH).join('')}…` : text;
}
