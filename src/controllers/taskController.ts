import { NextFunction, Request, Response } from 'express';
import { RewardService } from '../services/rewardService';
import { ConfirmationSweeper } from '../workers/confirmationSweeper';
import { serializeReport } from './presenters';

export const createTaskController = (sweeper: ConfirmationSweeper, rewards: RewardService) => ({
  // POST /api/v1/tasks/auto-confirm-expired - Admin
  autoConfirmExpired: async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await sweeper.runOnce();
      if (!outcome.acquired) {
        return res.status(409).json({
          error: { code: 'SWEEP_IN_PROGRESS', message: 'Another confirmation sweep is already running' },
        });
      }
      return res.status(200).json({
        data: {
          auto_confirmed: outcome.result.reports.length,
          reports: outcome.result.reports.map(serializeReport),
          failed: outcome.result.failed,
        },
      });
    } catch (error) {
      next(error);
    }
  },

  // POST /api/v1/tasks/monthly-subscription-points - Admin
  awardSubscriptionPoints: async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await rewards.awardMonthlySubscriptionPoints();
      return res.status(200).json({
        data: {
          period: result.period,
          awarded: result.awarded.map((entry) => ({ user_id: entry.userId, points: entry.points })),
          already_awarded: result.alreadyAwarded,
          flags_cleared: result.flagsCleared,
        },
      });
    } catch (error) {
      next(error);
    }
  },
});
