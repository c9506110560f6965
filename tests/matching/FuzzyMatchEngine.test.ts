import { describe, it, expect } from 'vitest';
import { FuzzyMatchEngine, SEQUENCE_WEIGHT, TOKEN_WEIGHT } from '../../src/matching/FuzzyMatchEngine.js';
import { parseDataset } from '../../src/dataset/parse.js';
import { TEST_CSV } from '../mocks/fixtures.js';

describe('FuzzyMatchEngine', () => {
  const engine = new FuzzyMatchEngine();
  const entries = parseDataset(TEST_CSV);

  it('should weight token overlap above sequence similarity', () => {
    expect(TOKEN_WEIGHT + SEQUENCE_WEIGHT).toBe(1);
    expect(TOKEN_WEIGHT).toBeGreaterThan(SEQUENCE_WEIGHT);
  });

  describe('exact matches', () => {
    it('should rank an exact Japanese question first with full confidence', () => {
      const results = engine.search(entries, 'PIP-Makerとは何ですか？', {
        category: 'general',
        threshold: 0.1,
      });

      expect(results).toHaveLength(1);
      expect(results[0].entry.id).toBe(1);
      expect(results[0].entry.category).toBe('general');
      expect(results[0].score).toBe(1);
      expect(results[0].matchedTerms).toEqual(['pip', 'maker', 'とは', '何', 'ですか']);
    });

    it('should score every stored question at least 0.9 against itself', () => {
      for (const entry of entries) {
        const [top] = engine.search(entries, entry.question, { threshold: 0.1 });
        expect(top.entry.id).toBe(entry.id);
        expect(top.score).toBeGreaterThanOrEqual(0.9);
      }
    });

    it('should ignore case, punctuation and spacing differences', () => {
      const [top] = engine.search(entries, '  can i EXPORT videos ', { threshold: 0.1 });
      expect(top.entry.id).toBe(5);
      expect(top.score).toBe(1);
    });
  });

  describe('partial matches', () => {
    it('should blend Jaccard and Levenshtein ratio', () => {
      // jaccard = 2/6, levenshtein("reset password", "how do i reset my password") = 12 over 26
      const [top] = engine.search(entries, 'reset password', { threshold: 0.1 });

      expect(top.entry.id).toBe(2);
      expect(top.score).toBeCloseTo(0.7 * (2 / 6) + 0.3 * (14 / 26), 10);
      expect(top.matchedTerms).toEqual(['reset', 'password']);
    });

    it('should report matched terms in query order', () => {
      const [top] = engine.search(entries, 'password reset', { threshold: 0.1 });
      expect(top.matchedTerms).toEqual(['password', 'reset']);
    });

    it('should order candidates by score', () => {
      const results = engine.search(entries, 'How do I', { threshold: 0.1 });

      expect(results[0].entry.id).toBe(2);
      expect(results[0].score).toBeCloseTo(0.7 * 0.5 + 0.3 * (8 / 26), 10);
      expect(results[1].entry.id).toBe(3);
      expect(results[1].score).toBeCloseTo(0.7 * (3 / 7) + 0.3 * 0.25, 10);
    });
  });

  describe('empty queries', () => {
    it.each(['', '   ', '？！'])('should return no results for %j', (query) => {
      expect(engine.search(entries, query, { threshold: 0 })).toEqual([]);
    });
  });

  describe('threshold', () => {
    it('should never add results when the threshold rises', () => {
      const queries = ['How do I', 'reset password', 'export', 'PIP-Maker', 'upload files'];
      const thresholds = [0, 0.05, 0.1, 0.3, 0.5, 0.9];

      for (const query of queries) {
        for (let i = 1; i < thresholds.length; i++) {
          const looser = engine.search(entries, query, { threshold: thresholds[i - 1], limit: 100 });
          const stricter = engine.search(entries, query, { threshold: thresholds[i], limit: 100 });
          const looserIds = new Set(looser.map((r) => r.entry.id));

          for (const result of stricter) {
            expect(looserIds.has(result.entry.id)).toBe(true);
          }
        }
      }
    });

    it('should keep every result at or above the threshold', () => {
      const results = engine.search(entries, 'How do I', { threshold: 0.3, limit: 100 });

      expect(results.map((r) => r.entry.id)).toEqual([2, 3]);
      for (const result of results) {
        expect(result.score).toBeGreaterThanOrEqual(0.3);
      }
    });
  });

  describe('ordering', () => {
    it('should keep dataset order for equal scores', () => {
      const dupes = parseDataset('q,a\nSame question,A\nOther,B\nSame question,C\nSame question,D');
      const results = engine.search(dupes, 'same question', { threshold: 0.5, limit: 10 });

      expect(results.map((r) => r.entry.id)).toEqual([1, 3, 4]);
      expect(results.map((r) => r.score)).toEqual([1, 1, 1]);
    });

    it('should keep dataset order for different questions with the same partial score', () => {
      // "alpha" against "alpha beta|zeta|iota": jaccard 1/2, levenshtein ratio 5/10
      const ties = parseDataset('q,a\nAlpha beta,A\nOther,B\nAlpha zeta,C\nAlpha iota,D\nAlpha,E');
      const results = engine.search(ties, 'alpha', { threshold: 0.4, limit: 10 });

      expect(results.map((r) => r.entry.id)).toEqual([5, 1, 3, 4]);
      expect(results[0].score).toBe(1);
      expect(results[1].score).toBeCloseTo(0.5, 10);
      expect(results[2].score).toBe(results[1].score);
      expect(results[3].score).toBe(results[1].score);
    });

    it('should return at most `limit` results', () => {
      expect(engine.search(entries, 'How do I', { threshold: 0, limit: 2 })).toHaveLength(2);
    });

    it('should default to five results', () => {
      expect(engine.search(entries, 'How do I', { threshold: 0 })).toHaveLength(5);
    });
  });

  describe('category filter', () => {
    it('should only score entries of the requested category', () => {
      const results = engine.search(entries, 'reset password', { category: 'features', threshold: 0, limit: 10 });

      expect(results.map((r) => r.entry.id).sort()).toEqual([4, 5]);
    });

    it('should compare categories case-insensitively', () => {
      const results = engine.search(entries, 'How do I', { category: 'ACCOUNT', threshold: 0, limit: 10 });

      expect(results.map((r) => r.entry.id)).toEqual([2, 3]);
    });

    it('should fall back to every entry when no entry has the category', () => {
      const filtered = engine.search(entries, 'reset password', { category: 'pricing', threshold: 0.1 });
      const unfiltered = engine.search(entries, 'reset password', { threshold: 0.1 });

      expect(filtered).toEqual(unfiltered);
      expect(filtered[0].entry.id).toBe(2);
    });

    it('should search every entry when nothing in the category clears the threshold', () => {
      const results = engine.search(entries, 'Can I export videos?', { category: 'account', threshold: 0.5 });

      expect(results).toHaveLength(1);
      expect(results[0].entry).toMatchObject({ id: 5, category: 'features' });
      expect(results[0].score).toBe(1);
    });

    it('should not widen the search while the category has a match above the threshold', () => {
      const results = engine.search(entries, 'Can I export videos?', { category: 'account', threshold: 0.01, limit: 10 });

      expect(results.map((r) => r.entry.id).sort()).toEqual([2, 3]);
    });
  });
});
