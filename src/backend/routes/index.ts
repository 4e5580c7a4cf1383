/**
 * Main router index - aggregates all route modules and exports the combined router.
 * This serves as the central routing configuration for the Express backend.
 */

import { Router } from 'express';
import type { Services } from '../services';
import { createGenerateRouter } from './generate';
import { createMetricsRouter } from './metrics';
import { createStatusRouter } from './status';

export function createApiRouter(services: Services): Router {
  const router = Router();

  // Mount all route modules
  router.use('/generate', createGenerateRouter(services));
  router.use('/metrics', createMetricsRouter(services));
  router.use('/status', createStatusRouter(services));

  return router;
}

export { createGenerateRouter, createMetricsRouter, createStatusRouter };
