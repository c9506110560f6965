/**
 * Shared test data and a container wired with in-memory stand-ins.
 */

import { createContainer, type Container, type ContainerSettings } from '../../src/container.js';
import type { CategoryCatalog } from '../../src/dataset/categoryCatalog.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { InMemorySessionStore } from '../../src/stores/InMemorySessionStore.js';
import { InMemoryRateLimitStore } from '../../src/stores/InMemoryRateLimitStore.js';
import { StaticDatasetSource } from './StaticDatasetSource.js';
import { RecordingNotificationSink } from './RecordingNotificationSink.js';
import { SequentialIdGenerator } from './SequentialIdGenerator.js';

/**
 * Entry ids follow row order:
 *   1 general   2 account (faq)   3 account   4 features (faq)   5 features
 */
export const TEST_CSV = [
  'question,answer,category,reference,remarks',
  'PIP-Makerとは何ですか？,PIP-Makerは解説動画を作成するサービスです。,general,https://example.com/docs/overview,faq',
  'How do I reset my password?,Open Settings and choose Reset password.,account,,faq',
  'How do I change my email address?,Open Settings and edit the Email field.,account,Help centre: account settings,',
  'What file formats can I upload?,PowerPoint and PDF files are supported.,features,,faq',
  'Can I export videos?,Videos can be exported as MP4.,features,"See https://example.com/docs/export.",',
].join('\n');

export const TEST_CATALOG: CategoryCatalog = {
  account: { label: 'Your account', description: 'Sign-in and profile settings.' },
};

export const FIXED_NOW = new Date('2026-03-02T09:30:00.000Z');

export interface TestHarness {
  container: Container;
  source: StaticDatasetSource;
  sink: RecordingNotificationSink;
  sessions: InMemorySessionStore;
  logProvider: ConsoleLogProvider;
  ids: SequentialIdGenerator;
}

export function createTestHarness(options?: {
  csv?: string;
  settings?: Partial<ContainerSettings>;
  catalog?: CategoryCatalog;
  now?: () => Date;
}): TestHarness {
  const now = options?.now ?? (() => FIXED_NOW);
  const source = new StaticDatasetSource(options?.csv ?? TEST_CSV);
  const sink = new RecordingNotificationSink();
  const sessions = new InMemorySessionStore({ ttlMs: 60 * 60_000, now });
  const logProvider = new ConsoleLogProvider();
  const ids = new SequentialIdGenerator();

  const container = createContainer({
    datasetSource: source,
    logProvider,
    notificationSink: sink,
    sessionStore: sessions,
    rateLimitStore: new InMemoryRateLimitStore(),
    ids,
    catalog: options?.catalog ?? TEST_CATALOG,
    settings: options?.settings,
    clock: now,
  });

  return { container, source, sink, sessions, logProvider, ids };
}
