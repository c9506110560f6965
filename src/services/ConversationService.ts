/**
 * Conversation service.
 * Resolves the session for a conversation id, applies one event through the
 * state machine under that id's lock, stores the result and hands the
 * resulting notifications to the dispatcher without waiting on them.
 */

import type { KnowledgeBaseService } from './KnowledgeBaseService.js';
import type { SearchService } from './SearchService.js';
import type { ISessionStore } from '../stores/ISessionStore.js';
import type { IIdGenerator } from '../providers/IIdGenerator.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { NotificationDispatcher } from '../providers/NotificationDispatcher.js';
import type { ConversationEvent, ConversationOutcome } from '../types/conversation.js';
import type { MachineSettings } from '../conversation/machine.js';
import { createSession, transition } from '../conversation/machine.js';
import { NotFoundError, ValidationError } from '../errors.js';

export class ConversationService {
  constructor(
    private readonly knowledgeBase: KnowledgeBaseService,
    private readonly searchService: SearchService,
    private readonly sessions: ISessionStore,
    private readonly ids: IIdGenerator,
    private readonly notifications: NotificationDispatcher,
    private readonly logProvider: ILogProvider,
    private readonly settings: MachineSettings,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Apply one event to a conversation.
   * `welcome` without an id starts a new conversation; `welcome` with an id
   * the store does not know starts one under that id. Any other event on an
   * unknown id is a NotFoundError.
   */
  async dispatch(
    conversationId: string | null,
    event: ConversationEvent
  ): Promise<ConversationOutcome> {
    const id = conversationId ?? (event.type === 'welcome' ? this.ids.conversationId() : null);
    if (!id) {
      throw new ValidationError('conversationId is required', { field: 'conversationId' });
    }

    await this.knowledgeBase.ensureLoaded();

    return this.sessions.withLock(id, async () => {
      const now = this.clock();
      let session = await this.sessions.get(id);
      if (!session) {
        if (event.type !== 'welcome') {
          throw new NotFoundError(`Conversation ${id} was not found`);
        }
        session = createSession(id, now);
      }

      const result = transition(session, event, {
        knowledge: this.knowledgeBase,
        search: this.searchService,
        ids: this.ids,
        now,
        settings: this.settings,
      });

      await this.sessions.save(result.session);
      for (const notification of result.notifications) {
        this.notifications.dispatch(notification);
      }

      this.logProvider.debug('Conversation event applied', {
        conversationId: id,
        event: event.type,
        from: session.state,
        to: result.session.state,
        directive: result.directive.kind,
      });

      return {
        conversationId: id,
        state: result.session.state,
        directive: result.directive,
      };
    });
  }
}
