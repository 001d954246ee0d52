import { NextFunction, Request, Response } from 'express';
import { currentActor } from '../middleware/auth';
import { WasteRepository } from '../repositories/types';
import { paginationSchema } from '../validators/reportSchemas';
import { serializeNotification } from './presenters';

export const createNotificationController = (repo: WasteRepository) => ({
  // GET /api/v1/notifications
  getNotifications: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = paginationSchema.parse(req.query);
      const notifications = await repo.listNotifications(currentActor(req).id, limit);
      return res.status(200).json({ data: notifications.map(serializeNotification) });
    } catch (error) {
      next(error);
    }
  },
});
