import { randomUUID } from 'crypto';

import type { Platform } from '@core/interfaces/message.types.js';

import type { RedisClient } from '@infra/redis/redis.client.js';
import { redisConfig } from '@infra/redis/redis.config.js';

/**
 * `throttled_notify` is returned once per throttled stretch so the caller sends a
 * single notice; later rejections are silent until a message is allowed again.
 */
export type RateDecision = 'allowed' | 'throttled_notify' | 'throttled_silent';

export interface RateLimiter {
  check(platform: Platform, userId: string): Promise<RateDecision>;
  allow(platform: Platform, userId: string): Promise<boolean>;
}

export interface RateLimitOptions {
  limit: number;
  windowMs: number;
}

function rateKey(platform: Platform, userId: string): string {
  return `${redisConfig.prefixes.rate}:${platform}:${userId}`;
}

const SLIDING_WINDOW = `
-- KEYS[1] = hits zset, KEYS[2] = notice flag
-- ARGV[1] = now ms, ARGV[2] = window ms, ARGV[3] = limit, ARGV[4] = member
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
redis.call('ZREMRANGEBYSCORE', KEYS[1], 0, now - window)
if redis.call('ZCARD', KEYS[1]) < tonumber(ARGV[3]) then
  redis.call('ZADD', KEYS[1], now, ARGV[4])
  redis.call('PEXPIRE', KEYS[1], window)
  redis.call('DEL', KEYS[2])
  return 1
end
if redis.call('SET', KEYS[2], '1', 'NX', 'PX', window) then
  return 0
end
return -1
`;

export class RedisRateLimiter implements RateLimiter {
  constructor(
    private readonly redis: RedisClient,
    private readonly options: RateLimitOptions,
  ) {}

  async check(platform: Platform, userId: string): Promise<RateDecision> {
    const key = rateKey(platform, userId);
    const code = await this.redis.eval(SLIDING_WINDOW, {
      keys: [key, `${key}:notice`],
      arguments: [String(Date.now()), String(this.options.windowMs), String(this.options.limit), randomUUID()],
    });
    if (code === 1) return 'allowed';
    return code === 0 ? 'throttled_notify' : 'throttled_silent';
  }

  async allow(platform: Platform, userId: string): Promise<boolean> {
    return (await this.check(platform, userId)) === 'allowed';
  }
}

interface Window {
  hits: number[];
  notified: boolean;
}

export class InMemoryRateLimiter implements RateLimiter {
  private readonly windows = new Map<string, Window>();

  constructor(
    private readonly options: RateLimitOptions,
    private readonly now: () => number = Date.now,
  ) {}

  async check(platform: Platform, userId: string): Promise<RateDecision> {
    const key = rateKey(platform, userId);
    const now = this.now();
    const window = this.windows.get(key) ?? { hits: [], notified: false };
    window.hits = window.hits.filter((t) => t > now - this.options.windowMs);
    this.windows.set(key, window);

    if (window.hits.length < this.options.limit) {
      window.hits.push(now);
      window.notified = false;
      return 'allowed';
    }
    if (!window.notified) {
      window.notified = true;
      return 'throttled_notify';
    }
    return 'throttled_silent';
  }

  async allow(platform: Platform, userId: string): Promise<boolean> {
    return (await this.check(platform, userId)) === 'allowed';
  }

  /** Drops windows with no recent hits. */
  sweep(): number {
    const cutoff = this.now() - this.options.windowMs;
    let removed = 0;
    for (const [key, window] of this.windows) {
      if (!window.hits.some((t) => t > cutoff)) {
        this.windows.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.windows.size;
  }
}
