/**
 * Dataset administration.
 * GET  /api/v1/admin/dataset         load state and category summary
 * POST /api/v1/admin/dataset/reload  re-read the dataset source
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { DatasetStatusResponse, ReloadResponse } from '../types/api.js';
import { json } from './respond.js';

export function createAdminHandlers(container: Container) {
  const { knowledgeBase } = container;

  const datasetStatus: Handler = pipeline(container.logging, container.errorHandler)(async () => {
    const status = knowledgeBase.status();
    const body: DatasetStatusResponse = {
      source: status.sourceName,
      loaded: status.loaded,
      entries: status.entries,
      loadedAt: status.loadedAt?.toISOString() ?? null,
      lastError: status.lastErrorReason,
      categories: status.loaded ? [...knowledgeBase.categories()] : [],
    };
    return json(body, 200, { 'Cache-Control': 'no-store' });
  });

  const reload: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.reload
  )(async () => {
    const snapshot = await knowledgeBase.reload();
    const body: ReloadResponse = {
      success: true,
      entries: snapshot.entries.length,
      loadedAt: snapshot.loadedAt.toISOString(),
    };
    return json(body);
  });

  return { datasetStatus, reload };
}
