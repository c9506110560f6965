/**
 * Knowledge base service.
 * Owns the in-memory snapshot of Q&A entries. A snapshot is frozen and is
 * only ever replaced as a whole, so searches can read it without locking
 * while a reload is running.
 */

import type { IDatasetSource } from '../dataset/IDatasetSource.js';
import type { CategoryCatalog } from '../dataset/categoryCatalog.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { NotificationDispatcher } from '../providers/NotificationDispatcher.js';
import type { CategorySummary, LoadFailureReason, QAEntry } from '../types/models.js';
import { parseDataset } from '../dataset/parse.js';
import { DatasetError, DatasetUnavailableError } from '../errors.js';

export interface KnowledgeBaseOptions {
  delimiter?: string;
  /** Remarks value marking an entry as a featured FAQ. Default: "faq". */
  faqMarker?: string;
  catalog?: CategoryCatalog;
}

export interface KnowledgeBaseSnapshot {
  readonly entries: readonly QAEntry[];
  readonly categories: readonly CategorySummary[];
  readonly loadedAt: Date;
}

export interface KnowledgeBaseStatus {
  source: string;
  sourceName: string;
  loaded: boolean;
  entries: number;
  loadedAt: Date | null;
  lastError: string | null;
  /** Reason of the last failed load, without the message. */
  lastErrorReason: LoadFailureReason | null;
}

const DEFAULT_FAQ_LIMIT = 10;

export class KnowledgeBaseService {
  private current: KnowledgeBaseSnapshot | null = null;
  private loading: Promise<KnowledgeBaseSnapshot> | null = null;
  private lastError: string | null = null;
  private lastErrorReason: LoadFailureReason | null = null;
  private readonly faqMarker: string;

  constructor(
    private readonly source: IDatasetSource,
    private readonly logProvider: ILogProvider,
    private readonly options: KnowledgeBaseOptions = {},
    private readonly notifications?: NotificationDispatcher
  ) {
    this.faqMarker = (options.faqMarker ?? 'faq').toLowerCase();
  }

  /**
   * Return the loaded snapshot, loading it first if needed.
   * Concurrent callers share one load. A failed load is logged and surfaces
   * as DatasetUnavailableError; the next call tries again.
   */
  async ensureLoaded(): Promise<KnowledgeBaseSnapshot> {
    if (this.current) return this.current;
    try {
      return await this.reload();
    } catch {
      throw new DatasetUnavailableError();
    }
  }

  /**
   * Re-read the source and swap in a new snapshot.
   * On failure the previous snapshot stays active and the DatasetError is rethrown.
   */
  async reload(): Promise<KnowledgeBaseSnapshot> {
    if (this.loading) return this.loading;

    this.loading = this.readSnapshot().finally(() => {
      this.loading = null;
    });
    return this.loading;
  }

  /** The active snapshot. Throws DatasetUnavailableError before the first load. */
  snapshot(): KnowledgeBaseSnapshot {
    if (!this.current) throw new DatasetUnavailableError();
    return this.current;
  }

  categories(): readonly CategorySummary[] {
    return this.snapshot().categories;
  }

  findCategory(categoryId: string): CategorySummary | null {
    const wanted = categoryId.trim().toLowerCase();
    return this.categories().find((c) => c.id.toLowerCase() === wanted) ?? null;
  }

  /**
   * Entries offered as FAQs for a category: those whose remarks carry the
   * FAQ marker, or every entry of the category when none is marked.
   */
  faqsForCategory(categoryId: string, limit: number = DEFAULT_FAQ_LIMIT): QAEntry[] {
    const inCategory = entriesInCategory(this.snapshot().entries, categoryId);
    const featured = inCategory.filter((e) => this.isFaq(e));
    return (featured.length > 0 ? featured : inCategory).slice(0, limit);
  }

  findEntry(id: number): QAEntry | null {
    return this.snapshot().entries.find((e) => e.id === id) ?? null;
  }

  status(): KnowledgeBaseStatus {
    return {
      source: this.source.description,
      sourceName: this.source.name,
      loaded: this.current !== null,
      entries: this.current?.entries.length ?? 0,
      loadedAt: this.current?.loadedAt ?? null,
      lastError: this.lastError,
      lastErrorReason: this.lastErrorReason,
    };
  }

  // ── Private ──

  private async readSnapshot(): Promise<KnowledgeBaseSnapshot> {
    try {
      const text = await this.source.read();
      const entries = parseDataset(text, { delimiter: this.options.delimiter });
      const snapshot: KnowledgeBaseSnapshot = Object.freeze({
        entries,
        categories: this.summarizeCategories(entries),
        loadedAt: new Date(),
      });

      this.current = snapshot;
      this.lastError = null;
      this.lastErrorReason = null;
      this.logProvider.info('Knowledge base loaded', {
        source: this.source.description,
        entries: entries.length,
        categories: snapshot.categories.length,
      });
      this.notifications?.dispatch({
        type: 'dataset_reloaded',
        entries: entries.length,
        success: true,
      });
      return snapshot;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.lastError = message;
      this.lastErrorReason = err instanceof DatasetError ? err.reason : 'Unknown';
      this.logProvider.error('Knowledge base load failed', {
        source: this.source.description,
        error: message,
        keptPreviousSnapshot: this.current !== null,
      });
      this.notifications?.dispatch({
        type: 'dataset_reloaded',
        entries: this.current?.entries.length ?? 0,
        success: false,
        error: message,
      });
      throw err;
    }
  }

  /** Distinct categories in first-seen order, compared case-insensitively. */
  private summarizeCategories(entries: readonly QAEntry[]): readonly CategorySummary[] {
    const counts = new Map<string, { id: string; entries: number; faqs: number }>();

    for (const entry of entries) {
      if (!entry.category) continue;
      const key = entry.category.toLowerCase();
      const count = counts.get(key) ?? { id: entry.category, entries: 0, faqs: 0 };
      count.entries++;
      if (this.isFaq(entry)) count.faqs++;
      counts.set(key, count);
    }

    return Object.freeze(
      [...counts].map(([key, count]) => {
        const meta = this.options.catalog?.[key];
        return Object.freeze({
          id: count.id,
          label: meta?.label ?? count.id,
          description: meta?.description ?? null,
          entryCount: count.entries,
          faqCount: count.faqs,
        });
      })
    );
  }

  private isFaq(entry: QAEntry): boolean {
    return entry.remarks?.trim().toLowerCase() === this.faqMarker;
  }
}

function entriesInCategory(entries: readonly QAEntry[], categoryId: string): QAEntry[] {
  const wanted = categoryId.trim().toLowerCase();
  return entries.filter((e) => e.category?.toLowerCase() === wanted);
}
