/**
 * Console-based log provider.
 * Keeps every event in memory for inspection (tests read `events`) and can
 * also print one JSON line per event to stdout.
 */

import { BaseLogProvider } from './BaseLogProvider.js';
import type { BaseLogProviderOptions } from './BaseLogProvider.js';
import type { LogEvent } from './ILogProvider.js';

export interface ConsoleLogProviderOptions extends BaseLogProviderOptions {
  /** Print events to stdout/stderr as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Keep at most this many events in `events`. Default: 1000. */
  bufferLimit?: number;
}

export class ConsoleLogProvider extends BaseLogProvider {
  /** Inspectable buffer of logged events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly bufferLimit: number;

  constructor(options?: ConsoleLogProviderOptions) {
    super(options);
    this.outputToConsole = options?.outputToConsole ?? false;
    this.bufferLimit = options?.bufferLimit ?? 1000;
  }

  async flush(): Promise<void> {
    // Writes are synchronous.
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }

  protected write(event: LogEvent): void {
    this.events.push(event);
    if (this.events.length > this.bufferLimit) {
      this.events.splice(0, this.events.length - this.bufferLimit);
    }

    if (this.outputToConsole) {
      const line = JSON.stringify(event);
      if (event.level === 'error' || event.level === 'warn') {
        console.error(line);
      } else {
        console.log(line);
      }
    }
  }
}
