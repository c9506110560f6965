/**
 * Netlify Function entry point.
 * Single function handles all /api/v1/* routes via the router.
 * The container is built on the first request and shared by warm invocations.
 */

import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { getProductionContainer } from '../../src/container.production.js';
import { createContext } from '../../src/middleware/pipeline.js';

let router: ReturnType<typeof createRouter> | null = null;

export default async (req: Request, context: Context) => {
  const container = await getProductionContainer();
  router ??= createRouter(container);
  return router.handle(req, createContext(context.requestId || container.ids.requestId()));
};

export const config = {
  path: '/api/v1/*',
};
