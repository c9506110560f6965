/**
 * Conversation session storage.
 * One session per conversation id. Callers that change a session do so
 * inside `withLock` for that id.
 */

import type { ConversationSession } from '../types/models.js';

export interface ISessionStore {
  /** A copy of the stored session, or null. */
  get(conversationId: string): Promise<ConversationSession | null>;

  /** Insert or replace. */
  save(session: ConversationSession): Promise<void>;

  delete(conversationId: string): Promise<void>;

  /** Run `task` with exclusive access to one conversation id. */
  withLock<T>(conversationId: string, task: () => Promise<T>): Promise<T>;

  /** Evict sessions idle longer than the inactivity window. Returns the number evicted. */
  sweep(now?: Date): Promise<number>;
}
