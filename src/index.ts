// Load and validate environment variables FIRST
import { loadEnv } from './config/env';

import { resolve } from 'path';
import { createApp, HealthCheck } from './app';
import { createPool, warmUpPool } from './config/postgres';
import { createRedisClient } from './config/redis';
import { loadScoringConfig } from './config/scoring';
import { createSqliteDatabase } from './config/sqlite';
import { RedisCounterStore } from './middleware/rateLimiter';
import { PostgresWasteRepository } from './repositories/postgres';
import { SqliteWasteRepository } from './repositories/sqlite';
import { WasteRepository } from './repositories/types';
import { DiskPhotoStorage, HttpPhotoStorage, PhotoStorage } from './services/photoStorage';
import { systemClock } from './utils/clock';
import { RedisJobLock } from './utils/jobLock';
import { createTokenService } from './utils/jwt';
import { logger } from './utils/logger';

async function main() {
  const env = loadEnv();
  const scoring = loadScoringConfig(env.REWARD_THRESHOLDS);

  const redis = createRedisClient(env.REDIS_URL);
  const healthChecks: Record<string, HealthCheck> = { redis: () => redis.ping() };
  const shutdownHooks: Array<() => Promise<unknown>> = [() => redis.quit()];

  let repo: WasteRepository;
  if (env.DATABASE_DRIVER === 'postgres' && env.DATABASE_URL) {
    const pool = createPool(env.DATABASE_URL);
    await warmUpPool(pool);
    repo = new PostgresWasteRepository(pool);
    healthChecks.database = () => pool.query('SELECT 1');
    shutdownHooks.push(() => pool.end());
  } else {
    const db = createSqliteDatabase(env.SQLITE_PATH);
    repo = new SqliteWasteRepository(db);
    healthChecks.database = async () => db.prepare('SELECT 1').get();
    shutdownHooks.push(async () => db.close());
  }

  const uploadDir = resolve(env.UPLOAD_DIR);
  const photos: PhotoStorage = env.PHOTO_STORAGE_URL
    ? new HttpPhotoStorage(env.PHOTO_STORAGE_URL, env.PHOTO_STORAGE_TOKEN)
    : new DiskPhotoStorage(uploadDir, env.PUBLIC_BASE_URL);

  const { app, services } = createApp({
    repo,
    photos,
    clock: systemClock,
    tokens: createTokenService(env.JWT_SECRET),
    jobLock: new RedisJobLock(redis),
    rateLimitStore: new RedisCounterStore(redis),
    scoring,
    sweepIntervalMs: env.SWEEP_INTERVAL_MS,
    staticDir: env.PHOTO_STORAGE_URL ? undefined : uploadDir,
    healthChecks,
    isDevelopment: env.NODE_ENV === 'development',
  });

  services.sweeper.start();

  const server = app.listen(env.PORT, () => {
    logger.info(
      { port: env.PORT, driver: env.DATABASE_DRIVER, photoStorage: env.PHOTO_STORAGE_URL ? 'http' : 'disk' },
      '🚀 Waste report API listening'
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    services.sweeper.stop();
    server.close(() => {
      Promise.all(shutdownHooks.map((hook) => hook()))
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
