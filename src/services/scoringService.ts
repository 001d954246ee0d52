import { defaultScoringConfig, ScoringConfig } from '../config/scoring';
import { PointComponent, Report, User } from '../types';
import { HOUR_MS } from '../utils/clock';

/**
 * Citizen scoring engine. Pure computation only: callers persist results
 * and credit points through the ledger.
 *
 * Criteria:
 * 1. Active monthly subscription → flat points per month
 * 2. Description quality → 0-30 points
 * 3. Verified waste weight → points per kg
 * 4. Fast confirmation (under 24h after the cleanup photo) → flat bonus
 */

export type ScorableReport = Pick<
  Report,
  | 'id'
  | 'descriptionQualityScore'
  | 'weightKg'
  | 'citizenConfirmed'
  | 'citizenConfirmedAt'
  | 'cleanupPhotoSubmittedAt'
>;

export interface PointsBreakdown {
  reportId: string;
  userId: string;
  details: Partial<Record<PointComponent, number>>;
  total: number;
}

export interface RewardTier {
  threshold: number;
  reward: string;
}

export interface NextReward extends RewardTier {
  pointsRemaining: number;
}

const QUANTITY_PATTERN = /\d+\s*(kg|kilo|kilos|tonne|tonnes|sac|sacs|unité|unités|m|m²|m3)/;

const isUppercaseLetter = (char: string): boolean =>
  char !== char.toLowerCase() && char === char.toUpperCase();

const sortedTiers = (config: ScoringConfig): RewardTier[] =>
  Object.entries(config.rewards)
    .map(([threshold, reward]) => ({ threshold: Number(threshold), reward }))
    .sort((a, b) => a.threshold - b.threshold);

export const scoreDescription = (text: unknown, config: ScoringConfig = defaultScoringConfig): number => {
  if (typeof text !== 'string') return 0;

  const trimmed = text.trim();
  if (trimmed.length < 10) return 0;

  let score = 0;
  const lower = trimmed.toLowerCase();

  // Length (max 10)
  const words = trimmed.split(/\s+/).length;
  if (words >= 20) {
    score += 10;
  } else if (words >= 10) {
    score += 5;
  } else if (words >= 5) {
    score += 2;
  }

  // Waste keywords (capped)
  let keywordPoints = 0;
  for (const [keyword, weight] of Object.entries(config.keywords)) {
    if (lower.includes(keyword)) {
      keywordPoints += weight;
    }
  }
  score += Math.min(keywordPoints, config.weights.maxKeywordPoints);

  // Quantities (max 4)
  if (QUANTITY_PATTERN.test(lower)) {
    score += 4;
  }

  // Structure and punctuation (max 4)
  if (trimmed.includes(',') && trimmed.includes('.')) {
    score += 2;
  }
  if (isUppercaseLetter(trimmed[0])) {
    score += 1;
  }
  if (trimmed.includes('?') || trimmed.includes('!')) {
    score += 1;
  }

  return Math.max(0, Math.min(score, config.weights.maxDescriptionPoints));
};

/**
 * Points a report is worth for its citizen, computed from stored fields.
 * Only contributing terms appear in `details`.
 */
export const pointsForReport = (
  report: ScorableReport,
  citizen: Pick<User, 'id'>,
  config: ScoringConfig = defaultScoringConfig
): PointsBreakdown => {
  const details: Partial<Record<PointComponent, number>> = {};

  const descriptionScore = report.descriptionQualityScore ?? 0;
  if (descriptionScore > 0) {
    details.description = descriptionScore;
  }

  if (report.weightKg !== null && report.weightKg > 0) {
    details.weight = Math.floor(report.weightKg * config.weights.pointsPerKg);
  }

  if (report.citizenConfirmed && report.cleanupPhotoSubmittedAt && report.citizenConfirmedAt) {
    const elapsed = report.citizenConfirmedAt.getTime() - report.cleanupPhotoSubmittedAt.getTime();
    if (elapsed < config.weights.fastConfirmationWindowHours * HOUR_MS) {
      details.confirmation_bonus = config.weights.confirmationBonus;
    }
  }

  const total = Object.values(details).reduce<number>((sum, points) => sum + (points ?? 0), 0);

  return { reportId: report.id, userId: citizen.id, details, total };
};

/**
 * Every reward tier the citizen has reached, ascending.
 */
export const rewardThresholds = (points: number, config: ScoringConfig = defaultScoringConfig): RewardTier[] =>
  sortedTiers(config).filter((tier) => points >= tier.threshold);

export const nextReward = (points: number, config: ScoringConfig = defaultScoringConfig): NextReward | null => {
  const tier = sortedTiers(config).find((candidate) => points < candidate.threshold);
  if (!tier) return null;
  return { ...tier, pointsRemaining: tier.threshold - points };
};

export const isLotteryEligible = (points: number, config: ScoringConfig = defaultScoringConfig): boolean => {
  const tiers = sortedTiers(config);
  if (tiers.length === 0) return false;
  return points >= tiers[0].threshold;
};

/**
 * Flat monthly award for subscribed citizens. When the flag is set but no
 * valid subscription row exists the caller must clear the flag.
 */
export const monthlySubscriptionPoints = (
  user: Pick<User, 'subscriptionActive'>,
  hasActiveSubscriptionRow: boolean,
  config: ScoringConfig = defaultScoringConfig
): number => {
  if (!user.subscriptionActive || !hasActiveSubscriptionRow) return 0;
  return config.weights.monthlySubscriptionPoints;
};
