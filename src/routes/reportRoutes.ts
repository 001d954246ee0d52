import { RequestHandler, Router } from 'express';
import { ReportController } from '../controllers/reportController';
import { AuthMiddleware } from '../middleware/auth';
import { requirePermission } from '../middleware/permissionMiddleware';

export const createReportRoutes = (
  controller: ReportController,
  auth: AuthMiddleware,
  createLimiter: RequestHandler
): Router => {
  const router = Router();

  router.post('/', auth.requireAuth, createLimiter, controller.createReport);

  // Agent queues (registered before /:id)
  router.get(
    '/awaiting-confirmation',
    auth.requireAuth,
    requirePermission('VIEW_AWAITING_CONFIRMATION'),
    controller.listAwaitingConfirmation
  );
  router.get('/disputed', auth.requireAuth, requirePermission('VIEW_DISPUTED'), controller.listDisputed);

  router.get('/my-reports', auth.requireAuth, controller.listMyReports);
  router.get('/collector/:collectorId', auth.requireAuth, controller.listCollectorReports);
  router.get('/collector/:collectorId/stats', auth.requireAuth, controller.getCollectorStats);

  router.get('/:id', auth.requireAuth, controller.getReport);
  router.delete('/:id', auth.requireAuth, controller.deleteReport);

  router.patch('/:id/assign', auth.requireAuth, controller.assignReport);
  router.patch('/:id/reassign', auth.requireAuth, requirePermission('REASSIGN_REPORTS'), controller.reassignReport);
  router.patch('/:id/start', auth.requireAuth, controller.startCleanup);

  router.post('/:id/cleanup-photo', auth.requireAuth, controller.submitCleanupPhoto);
  router.post('/:id/confirm-cleanup', auth.optionalAuth, controller.confirmCleanup);
  router.get('/:id/cleanup-status', auth.optionalAuth, controller.getCleanupStatus);

  router.put('/:id/resolve-dispute', auth.requireAuth, controller.resolveDispute);
  router.put('/:id/weight', auth.requireAuth, controller.recordWeight);
  router.put('/:id/confirm-collection', auth.requireAuth, controller.legacyConfirm);

  return router;
};
