/**
 * Turns ranked matches into a short, display-ready list of sources.
 * Pure: same matches in, same citations out.
 */

import type { Citation, CitationSet, MatchResult } from '../types/models.js';

const DEFAULT_EXCERPT_LENGTH = 200;
const ELLIPSIS = '…';
const INTERNAL_SOURCE_LABEL = 'Knowledge base';
const URL_PATTERN = /https?:\/\/[^\s)]+/;

export interface CitationComposerOptions {
  /** Maximum excerpt length in characters, before the ellipsis. Default: 200. */
  excerptLength?: number;
}

export class CitationComposer {
  private readonly excerptLength: number;

  constructor(options?: CitationComposerOptions) {
    this.excerptLength = options?.excerptLength ?? DEFAULT_EXCERPT_LENGTH;
  }

  compose(matches: readonly MatchResult[], maxItems: number): CitationSet {
    const unique = dedupeByEntry(matches);
    const showing = Math.min(unique.length, Math.max(0, maxItems));

    const items: Citation[] = unique.slice(0, showing).map((match, i) => {
      const reference = match.entry.reference?.trim() ?? '';
      return {
        id: `source_${i + 1}`,
        entryId: match.entry.id,
        title: match.entry.question,
        excerpt: truncate(match.entry.answer, this.excerptLength),
        sourceLabel: reference || INTERNAL_SOURCE_LABEL,
        url: extractUrl(reference),
        category: match.entry.category,
        confidence: roundScore(match.score),
        verified: reference.length > 0,
      };
    });

    return {
      items,
      totalSources: unique.length,
      showing,
      hasMore: unique.length > showing,
    };
  }
}

export function roundScore(score: number): number {
  return Math.round(score * 100) / 100;
}

function dedupeByEntry(matches: readonly MatchResult[]): MatchResult[] {
  const seen = new Set<number>();
  return matches.filter((m) => {
    if (seen.has(m.entry.id)) return false;
    seen.add(m.entry.id);
    return true;
  });
}

/** Code-point aware so multi-byte text is never cut mid-character. */
function truncate(text: string, limit: number): string {
  const chars = Array.from(text);
  if (chars.length <= limit) return text;
  return chars.slice(0, limit).join('').trimEnd() + ELLIPSIS;
}

function extractUrl(reference: string): string | null {
  const match = URL_PATTERN.exec(reference);
  return match ? match[0].replace(/[.,;]+$/, '') : null;
}
