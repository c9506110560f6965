/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * Production passes the file dataset source and real sinks; tests pass
 * in-memory stand-ins.
 */

import type { IDatasetSource } from './dataset/IDatasetSource.js';
import type { CategoryCatalog } from './dataset/categoryCatalog.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { INotificationSink } from './providers/INotificationSink.js';
import type { IIdGenerator } from './providers/IIdGenerator.js';
import type { ISessionStore } from './stores/ISessionStore.js';
import type { IRateLimitStore } from './stores/IRateLimitStore.js';
import type { Middleware } from './middleware/pipeline.js';
import { KnowledgeBaseService } from './services/KnowledgeBaseService.js';
import { SearchService } from './services/SearchService.js';
import { CitationComposer } from './services/CitationComposer.js';
import { ConversationService } from './services/ConversationService.js';
import { FeedbackService } from './services/FeedbackService.js';
import { FuzzyMatchEngine } from './matching/FuzzyMatchEngine.js';
import { NotificationDispatcher } from './providers/NotificationDispatcher.js';
import { createRateLimitMiddleware, rateLimits } from './middleware/rate-limit.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createErrorHandler } from './middleware/error-handler.js';

export interface ContainerSettings {
  delimiter: string;
  faqMarker: string;
  similarityThreshold: number;
  maxResults: number;
  maxCitations: number;
  excerptLength: number;
  inquirySuggestionBelow: number;
  inquiryResponseTime: string;
  rateLimitPerMinute: number;
  version: string;
}

export const DEFAULT_SETTINGS: ContainerSettings = {
  delimiter: ',',
  faqMarker: 'faq',
  similarityThreshold: 0.1,
  maxResults: 5,
  maxCitations: 3,
  excerptLength: 200,
  inquirySuggestionBelow: 0.5,
  inquiryResponseTime: 'within 1 business day',
  rateLimitPerMinute: 10,
  version: '1.0.0',
};

export interface Container {
  knowledgeBase: KnowledgeBaseService;
  searchService: SearchService;
  conversationService: ConversationService;
  feedbackService: FeedbackService;
  notifications: NotificationDispatcher;
  logProvider: ILogProvider;
  ids: IIdGenerator;
  version: string;
  logging: Middleware;
  errorHandler: Middleware;
  rateLimit: {
    search: Middleware;
    conversation: Middleware;
    feedback: Middleware;
    reload: Middleware;
  };
}

export function createContainer(deps: {
  datasetSource: IDatasetSource;
  logProvider: ILogProvider;
  notificationSink: INotificationSink;
  sessionStore: ISessionStore;
  rateLimitStore: IRateLimitStore;
  ids: IIdGenerator;
  catalog?: CategoryCatalog;
  settings?: Partial<ContainerSettings>;
  clock?: () => Date;
}): Container {
  const settings: ContainerSettings = { ...DEFAULT_SETTINGS, ...deps.settings };

  const notifications = new NotificationDispatcher(deps.notificationSink, deps.logProvider);
  const knowledgeBase = new KnowledgeBaseService(
    deps.datasetSource,
    deps.logProvider,
    {
      delimiter: settings.delimiter,
      faqMarker: settings.faqMarker,
      catalog: deps.catalog,
    },
    notifications
  );
  const searchService = new SearchService(
    knowledgeBase,
    new FuzzyMatchEngine(),
    new CitationComposer({ excerptLength: settings.excerptLength }),
    notifications,
    {
      similarityThreshold: settings.similarityThreshold,
      maxResults: settings.maxResults,
      maxCitations: settings.maxCitations,
    }
  );
  const conversationService = new ConversationService(
    knowledgeBase,
    searchService,
    deps.sessionStore,
    deps.ids,
    notifications,
    deps.logProvider,
    {
      inquirySuggestionBelow: settings.inquirySuggestionBelow,
      inquiryResponseTime: settings.inquiryResponseTime,
    },
    deps.clock
  );
  const feedbackService = new FeedbackService(deps.sessionStore, notifications, deps.clock);

  const limits = rateLimits(settings.rateLimitPerMinute);
  const rateLimit = {
    search: createRateLimitMiddleware(deps.rateLimitStore, limits.search),
    conversation: createRateLimitMiddleware(deps.rateLimitStore, limits.conversation),
    feedback: createRateLimitMiddleware(deps.rateLimitStore, limits.feedback),
    reload: createRateLimitMiddleware(deps.rateLimitStore, limits.reload),
  };

  return {
    knowledgeBase,
    searchService,
    conversationService,
    feedbackService,
    notifications,
    logProvider: deps.logProvider,
    ids: deps.ids,
    version: settings.version,
    logging: createLoggingMiddleware(deps.logProvider),
    errorHandler: createErrorHandler(deps.logProvider, deps.ids),
    rateLimit,
  };
}
