import { defaultScoringConfig, ScoringConfig } from '../config/scoring';
import { AppError } from '../lib/errors';
import { subscriptionSourceKey, WasteRepository } from '../repositories/types';
import { Clock } from '../utils/clock';
import { scoringLogger } from '../utils/logger';
import { NotificationService } from './notificationService';
import {
  isLotteryEligible,
  monthlySubscriptionPoints,
  nextReward,
  NextReward,
  RewardTier,
  rewardThresholds,
} from './scoringService';

export interface RewardSummary {
  userId: string;
  points: number;
  thresholdsReached: RewardTier[];
  nextReward: NextReward | null;
  lotteryEligible: boolean;
  totalReports: number;
  totalWeightKg: number;
}

export interface SubscriptionAwardResult {
  period: string;
  awarded: Array<{ userId: string; points: number }>;
  alreadyAwarded: string[];
  flagsCleared: string[];
}

const periodLabel = (date: Date): string =>
  `${date.getUTCFullYear()}-${String(date.getUTCMonth() + 1).padStart(2, '0')}`;

export class RewardService {
  constructor(
    private readonly repo: WasteRepository,
    private readonly clock: Clock,
    private readonly notifications: NotificationService,
    private readonly scoring: ScoringConfig = defaultScoringConfig
  ) {}

  listThresholds(): RewardTier[] {
    return rewardThresholds(Number.MAX_SAFE_INTEGER, this.scoring);
  }

  async getSummary(userId: string): Promise<RewardSummary> {
    const user = await this.repo.findUser(userId);
    if (!user) throw AppError.notFound('User', userId);

    const stats = await this.repo.getCitizenStats(userId);
    return {
      userId,
      points: user.points,
      thresholdsReached: rewardThresholds(user.points, this.scoring),
      nextReward: nextReward(user.points, this.scoring),
      lotteryEligible: isLotteryEligible(user.points, this.scoring),
      totalReports: stats.totalReports,
      totalWeightKg: stats.totalWeightKg,
    };
  }

  /**
   * Monthly award for subscribed citizens. Idempotent per user and month
   * through the ledger; users flagged without a valid subscription row get
   * their flag cleared instead.
   */
  async awardMonthlySubscriptionPoints(): Promise<SubscriptionAwardResult> {
    const now = this.clock.now();
    const result: SubscriptionAwardResult = {
      period: periodLabel(now),
      awarded: [],
      alreadyAwarded: [],
      flagsCleared: [],
    };

    const citizens = await this.repo.listSubscribedCitizens();
    for (const citizen of citizens) {
      const hasRow = await this.repo.hasValidSubscription(citizen.id, now);
      const points = monthlySubscriptionPoints(citizen, hasRow, this.scoring);

      if (points === 0) {
        await this.repo.setSubscriptionActive(citizen.id, false);
        result.flagsCleared.push(citizen.id);
        continue;
      }

      const credited = await this.repo.creditPoints(
        citizen.id,
        subscriptionSourceKey(citizen.id, now),
        [{ component: 'subscription', points }],
        now
      );
      if (credited.length === 0) {
        result.alreadyAwarded.push(citizen.id);
        continue;
      }

      result.awarded.push({ userId: citizen.id, points });
      await this.notifications.notifyPointsEarned(citizen.id, points, 'your monthly subscription', {
        period: result.period,
      });
    }

    scoringLogger.info(
      {
        period: result.period,
        awarded: result.awarded.length,
        alreadyAwarded: result.alreadyAwarded.length,
        flagsCleared: result.flagsCleared.length,
      },
      'Monthly subscription points processed'
    );
    return result;
  }
}
