import { Router } from 'express';
import { createTaskController } from '../controllers/taskController';
import { AuthMiddleware } from '../middleware/auth';
import { requirePermission } from '../middleware/permissionMiddleware';

export const createTaskRoutes = (controller: ReturnType<typeof createTaskController>, auth: AuthMiddleware): Router => {
  const router = Router();

  router.use(auth.requireAuth, requirePermission('RUN_SCHEDULED_TASKS'));
  router.post('/auto-confirm-expired', controller.autoConfirmExpired);
  router.post('/monthly-subscription-points', controller.awardSubscriptionPoints);

  return router;
};
