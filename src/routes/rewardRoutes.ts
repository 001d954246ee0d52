import { Router } from 'express';
import { createRewardController } from '../controllers/rewardController';
import { AuthMiddleware } from '../middleware/auth';

export const createRewardRoutes = (
  controller: ReturnType<typeof createRewardController>,
  auth: AuthMiddleware
): Router => {
  const router = Router();

  router.get('/thresholds', controller.getThresholds);
  router.get('/me', auth.requireAuth, controller.getMyRewards);

  return router;
};
