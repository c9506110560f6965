export { pipeline, createContext } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { createErrorHandler, FALLBACK_MESSAGE } from './error-handler.js';
export { validateBody, isRecord } from './validate-body.js';
export type { ValidateBodyOptions } from './validate-body.js';
export { createRateLimitMiddleware, rateLimits, ipKey } from './rate-limit.js';
export type { RateLimitConfig } from './rate-limit.js';
export { createLoggingMiddleware } from './logging.js';
