/**
 * Fans one event out to several sinks. Every sink is attempted; the
 * composite rejects afterwards if any of them failed.
 */

import type { INotificationSink, NotificationEvent } from './INotificationSink.js';

export class CompositeNotificationSink implements INotificationSink {
  constructor(private readonly sinks: readonly INotificationSink[]) {}

  async notify(event: NotificationEvent): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map((sink) => sink.notify(event)));
    const failures = results.filter(
      (r): r is PromiseRejectedResult => r.status === 'rejected'
    );

    if (failures.length > 0) {
      throw new AggregateError(
        failures.map((f) => f.reason),
        `${failures.length} of ${this.sinks.length} notification sinks failed`
      );
    }
  }
}

/** Accepts and discards everything. Used when no sink is configured. */
export class NoopNotificationSink implements INotificationSink {
  async notify(): Promise<void> {}
}
