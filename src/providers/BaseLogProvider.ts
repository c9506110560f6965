/**
 * Shared behaviour for log providers: level filtering, timestamping,
 * the service tag, and the convenience methods.
 * Subclasses only decide where a stamped event goes.
 */

import { LOG_LEVELS } from './ILogProvider.js';
import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';

export interface BaseLogProviderOptions {
  /** Events below this level are dropped. Default: 'debug' (keep everything). */
  minLevel?: LogLevel;
  /** Added to every event's fields as `service`. */
  service?: string;
}

export abstract class BaseLogProvider implements ILogProvider {
  private readonly minRank: number;
  private readonly service: string | undefined;

  protected constructor(options?: BaseLogProviderOptions) {
    this.minRank = LOG_LEVELS.indexOf(options?.minLevel ?? 'debug');
    this.service = options?.service;
  }

  log(event: LogEvent): void {
    if (LOG_LEVELS.indexOf(event.level) < this.minRank) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      ...(this.service !== undefined ? { fields: { service: this.service, ...event.fields } } : {}),
    };
    this.write(stamped);
  }

  abstract flush(): Promise<void>;

  protected abstract write(event: LogEvent): void;

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }
}
