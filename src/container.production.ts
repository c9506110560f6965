/**
 * Production container.
 * Reads configuration from the environment, loads the dataset from disk and
 * wires the notification sinks and log provider that are configured.
 * Slack, Supabase and Axiom are each optional; without them notifications
 * are dropped and logs go to the console.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig, type AppConfig } from './config.js';
import { createSupabaseClient } from './db.js';
import { FileDatasetSource } from './dataset/FileDatasetSource.js';
import { loadCategoryCatalog } from './dataset/categoryCatalog.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { CompositeNotificationSink, NoopNotificationSink } from './providers/CompositeNotificationSink.js';
import { SlackNotificationSink } from './providers/SlackNotificationSink.js';
import { SupabaseNotificationSink } from './providers/SupabaseNotificationSink.js';
import { RandomIdGenerator } from './providers/RandomIdGenerator.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { INotificationSink } from './providers/INotificationSink.js';
import { InMemorySessionStore } from './stores/InMemorySessionStore.js';
import { InMemoryRateLimitStore } from './stores/InMemoryRateLimitStore.js';

const SERVICE_NAME = 'faq-concierge';

let cached: Promise<Container> | null = null;

export function getProductionContainer(): Promise<Container> {
  if (!cached) {
    cached = buildContainer(loadConfig()).catch((err: unknown) => {
      // Let the next request try again instead of caching the failure
      cached = null;
      throw err;
    });
  }
  return cached;
}

export async function buildContainer(config: AppConfig): Promise<Container> {
  const logProvider = createLogProvider(config);
  const catalog = await loadCategoryCatalog(config.dataset.catalogPath);

  const sessionStore = new InMemorySessionStore({ ttlMs: config.session.ttlMs });
  sessionStore.startSweeper(config.session.sweepIntervalMs, logProvider);

  return createContainer({
    datasetSource: new FileDatasetSource(config.dataset.path),
    logProvider,
    notificationSink: createNotificationSink(config),
    sessionStore,
    rateLimitStore: new InMemoryRateLimitStore(),
    ids: new RandomIdGenerator(),
    catalog,
    settings: {
      delimiter: config.dataset.delimiter,
      faqMarker: config.dataset.faqMarker,
      similarityThreshold: config.search.similarityThreshold,
      maxResults: config.search.maxResults,
      maxCitations: config.search.maxCitations,
      excerptLength: config.search.excerptLength,
      inquirySuggestionBelow: config.search.inquirySuggestionBelow,
      inquiryResponseTime: config.inquiryResponseTime,
      rateLimitPerMinute: config.rateLimitPerMinute,
      version: config.version,
    },
  });
}

function createLogProvider(config: AppConfig): ILogProvider {
  // Axiom logging when configured, console otherwise.
  return config.axiom
    ? new AxiomLogProvider({
        apiToken: config.axiom.apiToken,
        dataset: config.axiom.dataset,
        minLevel: config.logLevel,
        service: SERVICE_NAME,
      })
    : new ConsoleLogProvider({
        outputToConsole: true,
        minLevel: config.logLevel,
        service: SERVICE_NAME,
      });
}

export function createNotificationSink(config: AppConfig): INotificationSink {
  const sinks: INotificationSink[] = [];
  if (config.slack) {
    sinks.push(new SlackNotificationSink({ webhookUrl: config.slack.webhookUrl }));
  }
  if (config.supabase) {
    const db = createSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey);
    sinks.push(new SupabaseNotificationSink(db));
  }

  if (sinks.length === 0) return new NoopNotificationSink();
  if (sinks.length === 1) return sinks[0];
  return new CompositeNotificationSink(sinks);
}
