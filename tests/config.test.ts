import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      dataset: {
        path: 'data/qa_data.csv',
        catalogPath: 'data/categories.json',
        delimiter: ',',
        faqMarker: 'faq',
      },
      search: {
        similarityThreshold: 0.1,
        maxResults: 5,
        maxCitations: 3,
        excerptLength: 200,
        inquirySuggestionBelow: 0.5,
      },
      session: { ttlMs: 1440 * 60_000, sweepIntervalMs: 300_000 },
      rateLimitPerMinute: 10,
      inquiryResponseTime: 'within 1 business day',
      version: '1.0.0',
      logLevel: 'info',
      slack: null,
      supabase: null,
      axiom: null,
    });
  });

  it('should coerce numeric settings from strings', () => {
    const config = loadConfig({
      SEARCH_SIMILARITY_THRESHOLD: '0.25',
      SEARCH_MAX_RESULTS: '8',
      SESSION_TTL_MINUTES: '30',
      RATE_LIMIT_PER_MINUTE: '60',
      DATASET_DELIMITER: '\t',
    });

    expect(config.search.similarityThreshold).toBe(0.25);
    expect(config.search.maxResults).toBe(8);
    expect(config.session.ttlMs).toBe(1_800_000);
    expect(config.rateLimitPerMinute).toBe(60);
    expect(config.dataset.delimiter).toBe('\t');
  });

  it('should enable optional integrations only when fully configured', () => {
    const config = loadConfig({
      SLACK_WEBHOOK_URL: 'https://hooks.slack.test/services/test-hook',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
      AXIOM_API_KEY: 'test-token',
    });

    expect(config.slack).toEqual({ webhookUrl: 'https://hooks.slack.test/services/test-hook' });
    expect(config.supabase).toEqual({ url: 'http://localhost:54321', serviceRoleKey: 'test-secret' });
    expect(config.axiom).toBeNull();
  });

  it('should treat blank optional values as unset', () => {
    expect(loadConfig({ SLACK_WEBHOOK_URL: '   ' }).slack).toBeNull();
  });

  it('should collect every invalid value into one ConfigError', () => {
    let caught: unknown;
    try {
      loadConfig({ SEARCH_SIMILARITY_THRESHOLD: '1.5', LOG_LEVEL: 'verbose' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0]).toMatch(/^SEARCH_SIMILARITY_THRESHOLD: /);
    expect(caught.issues[1]).toMatch(/^LOG_LEVEL: /);
  });

  it('should reject a webhook that is not a URL', () => {
    expect(() => loadConfig({ SLACK_WEBHOOK_URL: 'not a url' })).toThrow(ConfigError);
  });

  it('should require the Supabase URL and key together', () => {
    expect(() => loadConfig({ SUPABASE_URL: 'http://localhost:54321' })).toThrow(
      'Invalid configuration: SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set together'
    );
  });
});
