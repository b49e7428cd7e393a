import { Router, Request, Response, NextFunction } from 'express';
import type { ProfileService } from '../services/profile-service';

/**
 * Profile routes
 * GET /me - static profile plus a freshly fetched cat fact
 */
export function createProfileRoutes(profileService: ProfileService): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const profile = await profileService.getProfile();
      res.status(200).json(profile);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
