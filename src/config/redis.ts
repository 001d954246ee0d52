import Redis, { RedisOptions } from 'ioredis';
import { logger } from '../utils/logger';

const redisLogger = logger.child({ module: 'redis' });

/**
 * Strip anything around the redis:// URL (quotes, pasted CLI flags) and
 * switch Upstash hosts to TLS.
 */
export const normalizeRedisUrl = (raw: string): string => {
  let url = raw;
  try {
    url = decodeURIComponent(url);
  } catch {
    redisLogger.debug('REDIS_URL is not URI-encoded, using as-is');
  }

  const match = url.match(/(rediss?:\/\/[^\s"']+)/i);
  url = match ? match[1] : url.trim().split(/\s+/)[0];

  if (url.includes('upstash.io') && url.startsWith('redis://')) {
    url = url.replace('redis://', 'rediss://');
  }
  return url;
};

/**
 * Commands queued while Redis is unreachable fail after a couple of
 * reconnect attempts, so the rate limiter can fail open and the sweeper
 * and health check get an error instead of waiting.
 */
export const REDIS_CLIENT_OPTIONS = {
  maxRetriesPerRequest: 2,
  connectTimeout: 5000,
  enableReadyCheck: true,
  enableOfflineQueue: true,
} satisfies RedisOptions;

export const createRedisClient = (rawUrl: string): Redis => {
  const url = normalizeRedisUrl(rawUrl);

  const redis = new Redis(url, {
    ...(url.startsWith('rediss://') && {
      tls: {
        rejectUnauthorized: false,
      },
    }),
    ...REDIS_CLIENT_OPTIONS,
  });

  redis.on('ready', () => {
    redisLogger.info('Redis ready');
  });

  redis.on('error', (err: Error) => {
    redisLogger.error({ message: err.message }, 'Redis error');
  });

  return redis;
};
