/**
 * Free-text search over the knowledge base.
 * Ranks entries with the fuzzy matcher, answers with the best one and
 * attaches citations for the top matches. No match is a normal outcome
 * with confidence 0, not an error.
 */

import type { KnowledgeBaseService } from './KnowledgeBaseService.js';
import type { CitationComposer } from './CitationComposer.js';
import type { FuzzyMatchEngine } from '../matching/FuzzyMatchEngine.js';
import type { NotificationDispatcher } from '../providers/NotificationDispatcher.js';
import type { MatchSummary, SearchRequest, SearchResponse } from '../types/api.js';
import type { MatchResult } from '../types/models.js';
import { roundScore } from './CitationComposer.js';

export const NO_MATCH_ANSWER =
  "Sorry, I couldn't find an answer to that. Try different keywords, or send us an inquiry and a member of our team will get back to you.";

export interface SearchSettings {
  similarityThreshold: number;
  maxResults: number;
  maxCitations: number;
}

export class SearchService {
  constructor(
    private readonly knowledgeBase: KnowledgeBaseService,
    private readonly engine: FuzzyMatchEngine,
    private readonly citations: CitationComposer,
    private readonly notifications: NotificationDispatcher,
    private readonly settings: SearchSettings
  ) {}

  /** Rank entries for a query against the loaded snapshot. */
  match(question: string, category?: string | null): MatchResult[] {
    return this.engine.search(this.knowledgeBase.snapshot().entries, question, {
      category,
      threshold: this.settings.similarityThreshold,
      limit: this.settings.maxResults,
    });
  }

  /** Search without side effects; used by the conversation flow as well. */
  answer(question: string, category?: string | null): SearchResponse {
    const matches = this.match(question, category);
    const top = matches[0];

    if (!top) {
      return {
        answer: NO_MATCH_ANSWER,
        confidence: 0,
        question: null,
        category: category ?? null,
        reference: null,
        citations: this.citations.compose([], this.settings.maxCitations),
        matches: [],
      };
    }

    return {
      answer: top.entry.answer,
      confidence: roundScore(top.score),
      question: top.entry.question,
      category: top.entry.category ?? category ?? null,
      reference: top.entry.reference,
      citations: this.citations.compose(matches, this.settings.maxCitations),
      matches: matches.map(toSummary),
    };
  }

  /** Public search endpoint: loads the dataset if needed and reports the interaction. */
  async search(input: SearchRequest): Promise<SearchResponse> {
    await this.knowledgeBase.ensureLoaded();
    const result = this.answer(input.question, input.category);

    this.notifications.dispatch({
      type: 'search',
      conversationId: input.conversationId ?? null,
      question: input.question,
      answer: result.answer,
      confidence: result.confidence,
      category: result.category,
    });

    return result;
  }
}

function toSummary(match: MatchResult): MatchSummary {
  return {
    entryId: match.entry.id,
    question: match.entry.question,
    score: roundScore(match.score),
    matchedTerms: match.matchedTerms,
  };
}
