import { randomUUID } from 'crypto';
import Redis from 'ioredis';

/**
 * Mutual exclusion for scheduled jobs across processes. `acquire` returns
 * a token when the lock was taken, null when someone else holds it.
 */
export interface JobLock {
  acquire(key: string, ttlMs: number): Promise<string | null>;
  release(key: string, token: string): Promise<void>;
}

// Delete only if we still own it
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

export class RedisJobLock implements JobLock {
  constructor(private readonly redis: Redis) {}

  async acquire(key: string, ttlMs: number): Promise<string | null> {
    const token = randomUUID();
    const result = await this.redis.set(key, token, 'PX', ttlMs, 'NX');
    return result === 'OK' ? token : null;
  }

  async release(key: string, token: string): Promise<void> {
    await this.redis.eval(RELEASE_SCRIPT, 1, key, token);
  }
}

export class InMemoryJobLock implements JobLock {
  private readonly held = new Map<string, { token: string; expiresAt: number }>();

  async acquire(key: string, ttlMs: number): Promise<string | null> {
    const current = this.held.get(key);
    if (current && current.expiresAt > Date.now()) {
      return null;
    }
    const token = randomUUID();
    this.held.set(key, { token, expiresAt: Date.now() + ttlMs });
    return token;
  }

  async release(key: string, token: string): Promise<void> {
    if (this.held.get(key)?.token === token) {
      this.held.delete(key);
    }
  }
}

/**
 * Run `work` while holding the lock. Resolves to `{ acquired: false }`
 * without running anything when the lock is taken.
 */
export const withJobLock = async <T>(
  lock: JobLock,
  key: string,
  ttlMs: number,
  work: () => Promise<T>
): Promise<{ acquired: true; result: T } | { acquired: false }> => {
  const token = await lock.acquire(key, ttlMs);
  if (!token) {
    return { acquired: false };
  }
  try {
    return { acquired: true, result: await work() };
  } finally {
    await lock.release(key, token);
  }
};
