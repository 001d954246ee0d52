// Load environment variables FIRST before anything reads process.env
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  DATABASE_DRIVER: z.enum(['postgres', 'sqlite']).default('postgres'),
  DATABASE_URL: z.string().optional(),
  SQLITE_PATH: z.string().default('waste-reports.db'),

  REDIS_URL: z.string().default('redis://localhost:6379'),
  JWT_SECRET: z.string().min(1).default('dev-secret-change-in-prod'),

  PHOTO_STORAGE_URL: z.string().url().optional().or(z.literal('').transform(() => undefined)),
  PHOTO_STORAGE_TOKEN: z.string().optional(),
  UPLOAD_DIR: z.string().default('uploads'),
  PUBLIC_BASE_URL: z.string().default('http://localhost:3000'),

  SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  REWARD_THRESHOLDS: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export const loadEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }

  if (parsed.data.DATABASE_DRIVER === 'postgres' && !parsed.data.DATABASE_URL) {
    throw new Error('DATABASE_URL is required when DATABASE_DRIVER=postgres');
  }

  return parsed.data;
};
