import { NextFunction, Request, Response } from 'express';
import Redis from 'ioredis';
import { httpLogger } from '../utils/logger';

/**
 * Fixed-window request counter. `increment` returns the count in the
 * current window including this request.
 */
export interface CounterStore {
  increment(key: string, windowMs: number): Promise<number>;
}

export class RedisCounterStore implements CounterStore {
  constructor(private readonly redis: Redis) {}

  async increment(key: string, windowMs: number): Promise<number> {
    const current = await this.redis.incr(key);
    if (current === 1) {
      // First request, set expiry
      await this.redis.pexpire(key, windowMs);
    }
    return current;
  }
}

export class InMemoryCounterStore implements CounterStore {
  private readonly windows = new Map<string, { count: number; resetAt: number }>();

  async increment(key: string, windowMs: number): Promise<number> {
    const now = Date.now();
    const window = this.windows.get(key);
    if (!window || window.resetAt <= now) {
      this.windows.set(key, { count: 1, resetAt: now + windowMs });
      return 1;
    }
    window.count += 1;
    return window.count;
  }
}

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  keyPrefix?: string;
}

export const rateLimiter = (store: CounterStore, config: RateLimitConfig) => {
  return async (req: Request, res: Response, next: NextFunction) => {
    // Use the actor if authenticated, otherwise the IP address
    const identifier = req.actor?.id ?? req.ip ?? 'unknown';
    const key = `ratelimit:${config.keyPrefix ?? req.path}:${identifier}`;

    let current: number;
    try {
      current = await store.increment(key, config.windowMs);
    } catch (error) {
      // Fail open when the counter store is down
      httpLogger.error({ err: error, key }, 'Rate limiter store error');
      return next();
    }

    res.setHeader('X-RateLimit-Limit', config.maxRequests);
    res.setHeader('X-RateLimit-Remaining', Math.max(0, config.maxRequests - current));

    if (current > config.maxRequests) {
      return res.status(429).json({
        error: {
          code: 'RATE_LIMIT',
          message: `Too many requests. Retry after ${Math.ceil(config.windowMs / 1000)}s`,
        },
      });
    }

    next();
  };
};

// Report creation: 10 per citizen per day
export const REPORT_CREATION_LIMIT: RateLimitConfig = {
  windowMs: 24 * 60 * 60 * 1000,
  maxRequests: 10,
  keyPrefix: 'reports:create',
};
