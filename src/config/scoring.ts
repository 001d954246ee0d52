import { z } from 'zod';
import descriptionKeywords from '../data/description-keywords.json';

/**
 * Points required → reward description. Every threshold is also a
 * lottery draw tier; the lowest one gates lottery eligibility.
 */
export type RewardTable = Record<number, string>;

export interface ScoringWeights {
  pointsPerKg: number;
  confirmationBonus: number;
  fastConfirmationWindowHours: number;
  confirmationWindowHours: number;
  legacyConfirmationPoints: number;
  monthlySubscriptionPoints: number;
  maxDescriptionPoints: number;
  maxKeywordPoints: number;
}

export interface ScoringConfig {
  weights: ScoringWeights;
  rewards: RewardTable;
  keywords: Record<string, number>;
}

export const DEFAULT_WEIGHTS: ScoringWeights = {
  pointsPerKg: 2,
  confirmationBonus: 20,
  fastConfirmationWindowHours: 24,
  confirmationWindowHours: 48,
  legacyConfirmationPoints: 100,
  monthlySubscriptionPoints: 10,
  maxDescriptionPoints: 30,
  maxKeywordPoints: 12,
};

export const DEFAULT_REWARDS: RewardTable = {
  1000: 'School kit',
  2000: '25 kg bag of rice',
  3500: 'Cleaning kit and freezer',
  5000: 'Motorbike',
  7500: 'Collection vehicle',
};

const rewardTableSchema = z
  .record(z.string().regex(/^\d+$/, 'threshold must be a whole number'), z.string().min(1))
  .refine((table) => Object.keys(table).length > 0, 'at least one reward threshold is required');

const keywordTableSchema = z.record(z.string().min(1), z.number().int().positive());

/**
 * Parse a `{ "1000": "School kit", ... }` JSON document into a reward table.
 */
export const parseRewardTable = (raw: string): RewardTable => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`REWARD_THRESHOLDS is not valid JSON: ${reason}`);
  }

  const table = rewardTableSchema.parse(json);
  const rewards: RewardTable = {};
  for (const [threshold, reward] of Object.entries(table)) {
    rewards[Number(threshold)] = reward;
  }
  return rewards;
};

export const loadScoringConfig = (rewardThresholds?: string): ScoringConfig => ({
  weights: DEFAULT_WEIGHTS,
  rewards: rewardThresholds ? parseRewardTable(rewardThresholds) : DEFAULT_REWARDS,
  keywords: keywordTableSchema.parse(descriptionKeywords),
});

export const defaultScoringConfig: ScoringConfig = loadScoringConfig();
