/**
 * Fire-and-forget front for an INotificationSink.
 * `dispatch` returns immediately; the delivery runs detached and any failure
 * is logged as a warning. Nothing about delivery is reported to callers.
 */

import type { ILogProvider } from './ILogProvider.js';
import type { INotificationSink, NotificationEvent } from './INotificationSink.js';

export class NotificationDispatcher {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly sink: INotificationSink,
    private readonly logProvider: ILogProvider
  ) {}

  dispatch(event: NotificationEvent): void {
    const delivery: Promise<void> = Promise.resolve()
      .then(() => this.sink.notify(event))
      .catch((err: unknown) => {
        this.logProvider.warn('Notification delivery failed', {
          eventType: event.type,
          error: err instanceof Error ? err.message : String(err),
        });
      })
      .finally(() => {
        this.pending.delete(delivery);
      });

    this.pending.add(delivery);
  }

  /** Resolve once every delivery started so far has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }
}
