import { NextFunction, Request, Response } from 'express';
import { currentActor } from '../middleware/auth';
import { RewardService } from '../services/rewardService';

export const createRewardController = (rewards: RewardService) => ({
  // GET /api/v1/rewards/thresholds - Public
  getThresholds: (_req: Request, res: Response) => {
    return res.status(200).json({
      data: rewards.listThresholds().map((tier) => ({ threshold: tier.threshold, reward: tier.reward })),
    });
  },

  // GET /api/v1/rewards/me - Citizen
  getMyRewards: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const summary = await rewards.getSummary(currentActor(req).id);
      return res.status(200).json({
        data: {
          points: summary.points,
          thresholds_reached: summary.thresholdsReached,
          next_reward: summary.nextReward && {
            threshold: summary.nextReward.threshold,
            reward: summary.nextReward.reward,
            points_remaining: summary.nextReward.pointsRemaining,
          },
          lottery_eligible: summary.lotteryEligible,
          total_reports: summary.totalReports,
          total_weight_kg: summary.totalWeightKg,
        },
      });
    } catch (error) {
      next(error);
    }
  },
});
