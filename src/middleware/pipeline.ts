/**
 * Composable middleware pipeline for serverless function handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

export interface HandlerContext {
  /** Generated per request; appears in request logs. */
  requestId: string;
  /** Set by handlers once the request names a conversation. */
  conversationId: string | null;
  /** Parsed JSON body, set by validateBody. */
  body: Record<string, unknown> | null;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(logging, rateLimit)(handler)
 *   → logging wraps (rateLimit wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>(
      (next, mw) => mw(next),
      handler
    );
  };
}

export function createContext(requestId: string): HandlerContext {
  return { requestId, conversationId: null, body: null };
}
