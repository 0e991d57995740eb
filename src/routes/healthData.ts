import { Router } from 'express';

import { createHealthDataHandler, createSummaryHandler } from '../controllers/healthData';

import type { ReadContext } from '../controllers/healthData';

/**
 * Read endpoints mounted at /api/health-data.
 */
export function createHealthDataRouter(context: ReadContext): Router {
  const router = Router();

  router.get('/', createHealthDataHandler(context));
  router.get('/summary', createSummaryHandler(context));

  return router;
}
