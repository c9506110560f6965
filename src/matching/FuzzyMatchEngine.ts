/**
 * Fuzzy matching over knowledge-base questions.
 *
 * score = TOKEN_WEIGHT · jaccard(tokens) + SEQUENCE_WEIGHT · levenshteinRatio(text)
 *
 * Token overlap carries most of the weight: visitor queries are short and
 * keyword-driven, while the edit-distance term separates near-identical
 * phrasings that share the same keywords.
 */

import type { MatchResult, QAEntry } from '../types/models.js';
import { normalize, tokenize } from './normalize.js';
import { jaccard, levenshteinRatio } from './similarity.js';

export const TOKEN_WEIGHT = 0.7;
export const SEQUENCE_WEIGHT = 0.3;

const DEFAULT_LIMIT = 5;

export interface MatchOptions {
  /** Restrict candidates to this category (case-insensitive). */
  category?: string | null;
  /** Minimum score to keep, in [0, 1]. */
  threshold: number;
  /** Maximum results returned. Default: 5. */
  limit?: number;
}

interface PreparedText {
  text: string;
  tokens: string[];
}

export class FuzzyMatchEngine {
  /** Entries are frozen, so their normalized form can be cached per object. */
  private readonly prepared = new WeakMap<QAEntry, PreparedText>();

  search(
    entries: readonly QAEntry[],
    query: string,
    options: MatchOptions
  ): MatchResult[] {
    const q = prepare(query);
    if (q.tokens.length === 0) return [];

    const limit = options.limit ?? DEFAULT_LIMIT;
    const inCategory = filterByCategory(entries, options.category);
    const ranked = this.rank(q, inCategory, options.threshold);

    // An over-specific category never hides a match the full set has.
    const results =
      ranked.length === 0 && inCategory !== entries
        ? this.rank(q, entries, options.threshold)
        : ranked;

    return results.slice(0, limit);
  }

  // ── Private ──

  private rank(q: PreparedText, candidates: readonly QAEntry[], threshold: number): MatchResult[] {
    const scored: Array<{ result: MatchResult; position: number }> = [];
    candidates.forEach((entry, position) => {
      const result = this.score(q, entry);
      if (result.score >= threshold) {
        scored.push({ result, position });
      }
    });

    return scored
      .sort((a, b) => b.result.score - a.result.score || a.position - b.position)
      .map((s) => s.result);
  }

  private score(q: PreparedText, entry: QAEntry): MatchResult {
    const candidate = this.prepareEntry(entry);
    if (q.tokens.length === 0 || candidate.tokens.length === 0) {
      return { entry, score: 0, matchedTerms: [] };
    }

    const blended =
      TOKEN_WEIGHT * jaccard(q.tokens, candidate.tokens) +
      SEQUENCE_WEIGHT * levenshteinRatio(q.text, candidate.text);

    return {
      entry,
      score: Math.min(1, Math.max(0, blended)),
      matchedTerms: sharedTerms(q.tokens, candidate.tokens),
    };
  }

  private prepareEntry(entry: QAEntry): PreparedText {
    let cached = this.prepared.get(entry);
    if (!cached) {
      cached = prepare(entry.question);
      this.prepared.set(entry, cached);
    }
    return cached;
  }
}

function prepare(text: string): PreparedText {
  const normalized = normalize(text);
  return { text: normalized, tokens: tokenize(normalized) };
}

/** Entries of the requested category, or `entries` itself when none is requested. */
function filterByCategory(
  entries: readonly QAEntry[],
  category: string | null | undefined
): readonly QAEntry[] {
  const wanted = category?.trim().toLowerCase();
  if (!wanted) return entries;

  return entries.filter((e) => e.category?.toLowerCase() === wanted);
}

function sharedTerms(queryTokens: string[], candidateTokens: string[]): string[] {
  const candidate = new Set(candidateTokens);
  return [...new Set(queryTokens)].filter((token) => candidate.has(token));
}
