import { Router, Request, Response } from 'express';
import { Clock, HealthResponse, isoTimestamp } from '../services/profile-service';

/**
 * Health check
 * GET /health
 *
 * No external dependencies; always 200.
 */
export function createHealthRoutes(clock: Clock): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const body: HealthResponse = {
      status: 'healthy',
      timestamp: isoTimestamp(clock)
    };
    res.status(200).json(body);
  });

  return router;
}
