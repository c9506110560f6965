/**
 * Domain models: core entities as the application understands them.
 * Decoupled from both API shapes and the dataset's column layout.
 */

// ── Knowledge base ──

export type DatasetErrorReason = 'MalformedRow' | 'EmptyDataset' | 'Unreadable';

/** Why the last dataset load failed; `Unknown` when the error was not a DatasetError. */
export type LoadFailureReason = DatasetErrorReason | 'Unknown';

export interface QAEntry {
  /** 1-based position in the dataset; stable for the lifetime of a snapshot. */
  readonly id: number;
  readonly question: string;
  readonly answer: string;
  readonly category: string | null;
  /** Source note, often containing a URL. */
  readonly reference: string | null;
  readonly remarks: string | null;
}

export interface MatchResult {
  entry: QAEntry;
  /** Similarity in [0, 1]. */
  score: number;
  /** Distinct tokens shared by query and question, in query order. */
  matchedTerms: string[];
}

export interface Citation {
  id: string;
  entryId: number;
  title: string;
  excerpt: string;
  sourceLabel: string;
  url: string | null;
  category: string | null;
  confidence: number;
  verified: boolean;
}

export interface CitationSet {
  items: Citation[];
  totalSources: number;
  showing: number;
  hasMore: boolean;
}

export interface CategorySummary {
  id: string;
  label: string;
  description: string | null;
  entryCount: number;
  faqCount: number;
}

// ── Conversation ──

export type ConversationState =
  | 'initial'
  | 'category_selection'
  | 'faq_selection'
  | 'inquiry_form'
  | 'completed';

export interface ConversationSession {
  conversationId: string;
  state: ConversationState;
  selectedCategory: string | null;
  selectedFaqId: number | null;
  interactionCount: number;
  /** Set once the inquiry has been accepted. */
  inquiryId: string | null;
  createdAt: Date;
  lastActivityAt: Date;
}

// ── Outbound records ──

export type Rating = 'positive' | 'negative';

export interface FeedbackRecord {
  conversationId: string;
  rating: Rating;
  comment: string | null;
  timestamp: Date;
  /** Snapshot of the conversation when the feedback arrived, if it is still known. */
  context: {
    state: ConversationState;
    category: string | null;
    interactionCount: number;
  } | null;
}

export interface InquirySubmission {
  conversationId: string;
  name: string;
  company: string;
  email: string;
  message: string;
  submittedAt: Date;
  inquiryId: string;
}
