/**
 * Runtime configuration.
 * Read once from the environment, validated, and passed down explicitly;
 * nothing below the container touches process.env.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v === '' ? undefined : v))
  .optional();

const ratio = z.coerce.number().min(0).max(1);

const envSchema = z.object({
  DATASET_PATH: z.string().trim().min(1).default('data/qa_data.csv'),
  CATEGORY_CATALOG_PATH: z.string().trim().min(1).default('data/categories.json'),
  DATASET_DELIMITER: z.string().length(1).default(','),
  FAQ_MARKER: z.string().trim().min(1).default('faq'),
  SEARCH_SIMILARITY_THRESHOLD: ratio.default(0.1),
  SEARCH_MAX_RESULTS: z.coerce.number().int().min(1).max(50).default(5),
  CITATION_MAX_ITEMS: z.coerce.number().int().min(1).max(20).default(3),
  CITATION_EXCERPT_LENGTH: z.coerce.number().int().min(20).max(2000).default(200),
  INQUIRY_SUGGESTION_BELOW: ratio.default(0.5),
  SESSION_TTL_MINUTES: z.coerce.number().int().min(1).default(1440),
  SESSION_SWEEP_INTERVAL_SECONDS: z.coerce.number().int().min(0).default(300),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).default(10),
  INQUIRY_RESPONSE_TIME: z.string().trim().min(1).default('within 1 business day'),
  APP_VERSION: z.string().trim().min(1).default('1.0.0'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SLACK_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
  SUPABASE_URL: optionalString.pipe(z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  AXIOM_API_KEY: optionalString,
  AXIOM_DATASET: optionalString,
});

export interface AppConfig {
  dataset: {
    path: string;
    /** JSON file with category labels; a missing file means no labels. */
    catalogPath: string;
    delimiter: string;
    faqMarker: string;
  };
  search: {
    similarityThreshold: number;
    maxResults: number;
    maxCitations: number;
    excerptLength: number;
    /** Below this top confidence, search directives also offer the inquiry form. */
    inquirySuggestionBelow: number;
  };
  session: {
    ttlMs: number;
    sweepIntervalMs: number;
  };
  rateLimitPerMinute: number;
  inquiryResponseTime: string;
  version: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  slack: { webhookUrl: string } | null;
  supabase: { url: string; serviceRoleKey: string } | null;
  axiom: { apiToken: string; dataset: string } | null;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  if (Boolean(e.SUPABASE_URL) !== Boolean(e.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new ConfigError([
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set together',
    ]);
  }

  return {
    dataset: {
      path: e.DATASET_PATH,
      catalogPath: e.CATEGORY_CATALOG_PATH,
      delimiter: e.DATASET_DELIMITER,
      faqMarker: e.FAQ_MARKER,
    },
    search: {
      similarityThreshold: e.SEARCH_SIMILARITY_THRESHOLD,
      maxResults: e.SEARCH_MAX_RESULTS,
      maxCitations: e.CITATION_MAX_ITEMS,
      excerptLength: e.CITATION_EXCERPT_LENGTH,
      inquirySuggestionBelow: e.INQUIRY_SUGGESTION_BELOW,
    },
    session: {
      ttlMs: e.SESSION_TTL_MINUTES * 60_000,
      sweepIntervalMs: e.SESSION_SWEEP_INTERVAL_SECONDS * 1000,
    },
    rateLimitPerMinute: e.RATE_LIMIT_PER_MINUTE,
    inquiryResponseTime: e.INQUIRY_RESPONSE_TIME,
    version: e.APP_VERSION,
    logLevel: e.LOG_LEVEL,
    slack: e.SLACK_WEBHOOK_URL ? { webhookUrl: e.SLACK_WEBHOOK_URL } : null,
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
        ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
        : null,
    axiom:
      e.AXIOM_API_KEY && e.AXIOM_DATASET
        ? { apiToken: e.AXIOM_API_KEY, dataset: e.AXIOM_DATASET }
        : null,
  };
}
