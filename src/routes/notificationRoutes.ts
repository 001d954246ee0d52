import { Router } from 'express';
import { createNotificationController } from '../controllers/notificationController';
import { AuthMiddleware } from '../middleware/auth';

export const createNotificationRoutes = (
  controller: ReturnType<typeof createNotificationController>,
  auth: AuthMiddleware
): Router => {
  const router = Router();

  router.get('/', auth.requireAuth, controller.getNotifications);

  return router;
};
