/**
 * Status route - which provider, model and compiler the server runs with.
 * API keys are never part of the response.
 */

import { Router, Request, Response } from 'express';
import type { StatusResponse } from '../../shared/types/api';
import type { Services } from '../services';

export function createStatusRouter(services: Services): Router {
  const router = Router();

  /**
   * GET /api/status
   */
  router.get('/', (_req: Request, res: Response) => {
    const { config } = services;
    const body: StatusResponse = {
      success: true,
      provider: config.llm.provider,
      model: config.llm.model,
      compiler: config.latex.command,
      limits: services.pipeline.getValidator().getLimits()
    };
    res.json(body);
  });

  return router;
}
