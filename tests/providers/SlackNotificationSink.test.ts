import { describe, it, expect, vi } from 'vitest';
import {
  SlackNotificationSink,
  formatSlackMessage,
} from '../../src/providers/SlackNotificationSink.js';
import type { NotificationEvent } from '../../src/providers/INotificationSink.js';

const WEBHOOK = 'https://hooks.slack.test/services/test-hook';
const SUBMITTED_AT = new Date('2026-03-02T09:30:00.000Z');

describe('formatSlackMessage', () => {
  it('should describe a search with its confidence and answer preview', () => {
    expect(
      formatSlackMessage({
        type: 'search',
        conversationId: null,
        question: 'Can I export videos?',
        answer: 'Yes, as MP4.',
        confidence: 0.5,
        category: 'features',
      })
    ).toBe(':mag: Search (confidence 0.50): Can I export videos?\n> Yes, as MP4.');
  });

  it('should describe an FAQ pick, naming missing categories', () => {
    expect(
      formatSlackMessage({
        type: 'faq_selected',
        conversationId: 'conv_1',
        faqId: 7,
        question: 'Is there an API?',
        category: null,
      })
    ).toBe(':bookmark: FAQ #7 selected in uncategorized: Is there an API?');
  });

  it('should describe an inquiry with its reference number', () => {
    expect(
      formatSlackMessage({
        type: 'inquiry_submitted',
        inquiry: {
          conversationId: 'conv_1',
          inquiryId: 'INQ-0001',
          name: 'Aiko Tanaka',
          company: 'Example KK',
          email: 'aiko@example.com',
          message: 'Please call me.',
          submittedAt: SUBMITTED_AT,
        },
      })
    ).toBe(
      ':incoming_envelope: New inquiry INQ-0001 from Aiko Tanaka (Example KK) <aiko@example.com>\n> Please call me.'
    );
  });

  it('should cut long text at 100 characters', () => {
    const message = formatSlackMessage({
      type: 'feedback',
      feedback: {
        conversationId: 'conv_2',
        rating: 'negative',
        comment: 'x'.repeat(150),
        timestamp: SUBMITTED_AT,
        context: null,
      },
    });
    expect(message).toBe(`:warning: Negative feedback on conversation conv_2: ${'x'.repeat(100)}…`);
  });

  it('should skip positive feedback', () => {
    expect(
      formatSlackMessage({
        type: 'feedback',
        feedback: {
          conversationId: 'conv_2',
          rating: 'positive',
          comment: null,
          timestamp: SUBMITTED_AT,
          context: null,
        },
      })
    ).toBeNull();
  });

  it('should report reload outcomes', () => {
    expect(formatSlackMessage({ type: 'dataset_reloaded', entries: 18, success: true })).toBe(
      ':books: Knowledge base reloaded (18 entries)'
    );
    expect(
      formatSlackMessage({ type: 'dataset_reloaded', entries: 18, success: false, error: 'ENOENT' })
    ).toBe(':x: Knowledge base reload failed: ENOENT');
  });
});

describe('SlackNotificationSink', () => {
  const reloaded: NotificationEvent = { type: 'dataset_reloaded', entries: 2, success: true };

  it('should post the message text to the webhook', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response('ok', { status: 200 }));
    await new SlackNotificationSink({ webhookUrl: WEBHOOK, fetchFn }).notify(reloaded);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe(WEBHOOK);
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      text: ':books: Knowledge base reloaded (2 entries)',
    });
  });

  it('should not call the webhook for events it does not forward', async () => {
    const fetchFn = vi.fn<typeof fetch>();
    await new SlackNotificationSink({ webhookUrl: WEBHOOK, fetchFn }).notify({
      type: 'feedback',
      feedback: {
        conversationId: 'conv_3',
        rating: 'positive',
        comment: null,
        timestamp: SUBMITTED_AT,
        context: null,
      },
    });
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should reject when Slack answers with an error status', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response('no_service', { status: 404 }));
    await expect(
      new SlackNotificationSink({ webhookUrl: WEBHOOK, fetchFn }).notify(reloaded)
    ).rejects.toThrow('Slack webhook returned HTTP 404');
  });
});
