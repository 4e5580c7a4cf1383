/**
 * Metrics route - the calling session's run history.
 */

import { Router, Request, Response } from 'express';
import type { MetricsResponse } from '../../shared/types/api';
import { getSessionId, requireSession } from '../middleware/session';
import type { Services } from '../services';

export function createMetricsRouter(services: Services): Router {
  const router = Router();

  /**
   * GET /api/metrics
   * Ordered records of the session plus a summary; empty for a new session
   */
  router.get('/', requireSession, (req: Request, res: Response) => {
    const log = services.sessions.peek(getSessionId(req));
    const body: MetricsResponse = {
      success: true,
      records: log ? [...log.entries()] : [],
      summary: log
        ? log.summary()
        : { runs: 0, succeededRuns: 0, totalTokens: 0, averageElapsedSeconds: 0 }
    };
    res.json(body);
  });

  return router;
}
