/**
 * In-memory session store with per-conversation locking and an
 * inactivity sweep. A session whose lock is held is never evicted.
 */

import { KeyedMutex } from './KeyedMutex.js';
import type { ISessionStore } from './ISessionStore.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ConversationSession } from '../types/models.js';

export interface InMemorySessionStoreOptions {
  /** Inactivity window in ms. */
  ttlMs: number;
  /** Clock used by sweeps. Default: current time. */
  now?: () => Date;
}

export class InMemorySessionStore implements ISessionStore {
  private readonly sessions = new Map<string, ConversationSession>();
  private readonly mutex = new KeyedMutex();
  private readonly ttlMs: number;
  private readonly now: () => Date;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: InMemorySessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.sessions.size;
  }

  async get(conversationId: string): Promise<ConversationSession | null> {
    const session = this.sessions.get(conversationId);
    return session ? { ...session } : null;
  }

  async save(session: ConversationSession): Promise<void> {
    this.sessions.set(session.conversationId, { ...session });
  }

  async delete(conversationId: string): Promise<void> {
    this.sessions.delete(conversationId);
  }

  withLock<T>(conversationId: string, task: () => Promise<T>): Promise<T> {
    return this.mutex.run(conversationId, task);
  }

  async sweep(now: Date = this.now()): Promise<number> {
    const cutoff = now.getTime() - this.ttlMs;
    let evicted = 0;

    for (const [id, session] of this.sessions) {
      if (session.lastActivityAt.getTime() >= cutoff) continue;
      if (this.mutex.isLocked(id)) continue;
      this.sessions.delete(id);
      evicted++;
    }

    return evicted;
  }

  /** Sweep on an interval. The timer does not keep the process alive. */
  startSweeper(intervalMs: number, logProvider?: ILogProvider): void {
    if (this.sweepTimer || intervalMs <= 0) return;

    this.sweepTimer = setInterval(() => {
      this.sweep()
        .then((evicted) => {
          if (evicted > 0) {
            logProvider?.info('Expired conversation sessions evicted', {
              evicted,
              remaining: this.sessions.size,
            });
          }
        })
        .catch((err: unknown) => {
          logProvider?.error('Session sweep failed', {
            error: err instanceof Error ? err.message : String(err),
          });
        });
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
