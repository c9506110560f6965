/**
 * Health endpoint.
 * GET /api/v1/health 200 when the knowledge base is loaded, 503 otherwise
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { HealthResponse } from '../types/api.js';
import { json } from './respond.js';

export function createHealthHandlers(container: Container) {
  const check: Handler = pipeline(container.logging, container.errorHandler)(async () => {
    let loaded = true;
    try {
      await container.knowledgeBase.ensureLoaded();
    } catch (err) {
      loaded = false;
      container.logProvider.warn('Health check found no knowledge base', {
        error: err instanceof Error ? err.message : String(err),
      });
    }

    const status = container.knowledgeBase.status();
    const body: HealthResponse = {
      status: loaded ? 'ok' : 'degraded',
      version: container.version,
      entries: status.entries,
      loadedAt: status.loadedAt?.toISOString() ?? null,
    };

    return json(body, loaded ? 200 : 503, { 'Cache-Control': 'no-store' });
  });

  return { check };
}
