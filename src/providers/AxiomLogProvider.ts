/**
 * Axiom log provider.
 * Buffers events and sends them in batches to Axiom's ingest API.
 * Non-blocking: failed batches stay buffered and are retried on the next
 * flush, up to `maxBuffered` events (oldest dropped first).
 * Degrades to a no-op when apiToken is empty.
 */

import { BaseLogProvider } from './BaseLogProvider.js';
import type { BaseLogProviderOptions } from './BaseLogProvider.js';
import type { LogEvent } from './ILogProvider.js';

export interface AxiomLogProviderOptions extends BaseLogProviderOptions {
  /** Axiom API token (Bearer). Empty string disables sending. */
  apiToken: string;
  /** Axiom dataset name. */
  dataset: string;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000. 0 disables. */
  flushIntervalMs?: number;
  /** Upper bound on retained events while Axiom is unreachable. Default: 1000. */
  maxBuffered?: number;
  /** Injected for tests. Default: global fetch. */
  fetchFn?: typeof fetch;
}

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider extends BaseLogProvider {
  private buffer: LogEvent[] = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly flushThreshold: number;
  private readonly maxBuffered: number;
  private readonly fetchFn: typeof fetch;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  /** Why the most recent flush failed; null after a successful one. */
  lastError: string | null = null;
  private readonly enabled: boolean;

  constructor(options: AxiomLogProviderOptions) {
    super(options);
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.flushThreshold = options.flushThreshold ?? 50;
    this.maxBuffered = options.maxBuffered ?? 1000;
    this.fetchFn = options.fetchFn ?? fetch;
    this.enabled = Boolean(this.apiToken);

    const intervalMs = options.flushIntervalMs ?? 10_000;
    if (this.enabled && intervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, intervalMs);
      // Don't hold the process open for the timer
      this.flushTimer.unref();
    }
  }

  /** Number of events waiting to be sent. */
  get pending(): number {
    return this.buffer.length;
  }

  async flush(): Promise<void> {
    if (!this.enabled || this.buffer.length === 0) return;
    // One request at a time; a concurrent flush waits for the running one.
    if (this.inFlight) return this.inFlight;

    this.inFlight = this.send().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  protected write(event: LogEvent): void {
    if (!this.enabled) return;

    this.buffer.push(event);
    if (this.buffer.length > this.maxBuffered) {
      this.buffer.splice(0, this.buffer.length - this.maxBuffered);
    }

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  private async send(): Promise<void> {
    const batch = [...this.buffer];

    try {
      const response = await this.fetchFn(`${AXIOM_INGEST_URL}/${this.dataset}/ingest`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify(batch),
      });

      if (response.ok) {
        // Events logged during the request stay queued.
        const sent = new Set(batch);
        this.buffer = this.buffer.filter((event) => !sent.has(event));
        this.lastError = null;
      } else {
        this.lastError = `Axiom ingest returned HTTP ${response.status}`;
      }
    } catch (err) {
      // Retained for retry on next flush
      this.lastError = err instanceof Error ? err.message : String(err);
    }
  }
}
