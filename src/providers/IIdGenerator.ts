/**
 * Source of identifiers. Injected so tests can use predictable ids.
 */

export interface IIdGenerator {
  /** Opaque, unique conversation id. */
  conversationId(): string;
  /** Reference number handed to a visitor whose inquiry was accepted. */
  inquiryId(now: Date): string;
  /** Short id attached to logged failures and shown to the visitor. */
  correlationId(): string;
  /** Per-request id used in request logs. */
  requestId(): string;
}
