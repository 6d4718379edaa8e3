import express, { RequestHandler, Router } from 'express';

import { createIngestHandler } from '../controllers/ingester';
import { requireUploadToken } from '../middleware/auth';

import type { IngesterDependencies } from '../controllers/ingester';

export interface IngesterRouterOptions extends IngesterDependencies {
  bodyLimit: string;
  uploadToken?: string;
}

/**
 * Upload route. The body is read as text whatever its content type; the
 * exporter does not always label it as JSON.
 */
export default function createIngesterRouter(options: IngesterRouterOptions): Router {
  const { bodyLimit, uploadToken, ...deps } = options;
  const router = Router();

  const handlers: RequestHandler[] = [
    express.text({ limit: bodyLimit, type: () => true }),
    createIngestHandler(deps),
  ];
  if (uploadToken) {
    router.post('/upload', requireUploadToken(uploadToken), ...handlers);
  } else {
    router.post('/upload', ...handlers);
  }

  return router;
}
