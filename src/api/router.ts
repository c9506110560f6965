/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic: works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createSearchHandlers } from './search.js';
import { createFeedbackHandlers } from './feedback.js';
import { createConversationHandlers } from './conversation.js';
import { createHealthHandlers } from './health.js';
import { createAdminHandlers } from './admin.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const search = createSearchHandlers(container);
  const feedback = createFeedbackHandlers(container);
  const conversation = createConversationHandlers(container);
  const health = createHealthHandlers(container);
  const admin = createAdminHandlers(container);

  const routes: Route[] = [
    // Search & feedback
    { method: 'POST', pattern: /^\/api\/v1\/search\/?$/, handler: search.search },
    { method: 'POST', pattern: /^\/api\/v1\/feedback\/?$/, handler: feedback.submit },

    // Conversation
    { method: 'GET', pattern: /^\/api\/v1\/conversation\/welcome\/?$/, handler: conversation.welcomeGet },
    { method: 'POST', pattern: /^\/api\/v1\/conversation\/welcome\/?$/, handler: conversation.welcomePost },
    { method: 'POST', pattern: /^\/api\/v1\/conversation\/category\/?$/, handler: conversation.selectCategory },
    { method: 'POST', pattern: /^\/api\/v1\/conversation\/faq\/?$/, handler: conversation.selectFaq },
    { method: 'POST', pattern: /^\/api\/v1\/conversation\/query\/?$/, handler: conversation.query },
    { method: 'POST', pattern: /^\/api\/v1\/conversation\/inquiry\/start\/?$/, handler: conversation.startInquiry },
    { method: 'POST', pattern: /^\/api\/v1\/conversation\/inquiry\/?$/, handler: conversation.submitInquiry },
    { method: 'POST', pattern: /^\/api\/v1\/conversation\/restart\/?$/, handler: conversation.restart },

    // Operations
    { method: 'GET', pattern: /^\/api\/v1\/health\/?$/, handler: health.check },
    { method: 'GET', pattern: /^\/api\/v1\/admin\/dataset\/?$/, handler: admin.datasetStatus },
    { method: 'POST', pattern: /^\/api\/v1\/admin\/dataset\/reload\/?$/, handler: admin.reload },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCorsHeaders(response);
      }
    }

    // Check if path matches but method doesn't
    const pathMatches = routes.some((r) => r.pattern.test(url.pathname));
    if (pathMatches) {
      const allowed = routes
        .filter((r) => r.pattern.test(url.pathname))
        .map((r) => r.method)
        .join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: { 'Content-Type': 'application/json', ...corsHeaders() },
      }
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
