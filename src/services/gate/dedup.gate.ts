import type { Platform } from '@core/interfaces/message.types.js';

import type { RedisClient } from '@infra/redis/redis.client.js';
import { redisConfig } from '@infra/redis/redis.config.js';

/** Remembers processed platform message ids for a bounded time. */
export interface DedupGate {
  seen(platform: Platform, messageId: string): Promise<boolean>;
  markSeen(platform: Platform, messageId: string): Promise<void>;
  /** Atomically marks the id and reports whether this caller was first. */
  claim(platform: Platform, messageId: string): Promise<boolean>;
  /** Forgets a claim so a platform retry can be processed again. */
  release(platform: Platform, messageId: string): Promise<void>;
}

function dedupKey(platform: Platform, messageId: string): string {
  return `${redisConfig.prefixes.dedup}:${platform}:${messageId}`;
}

export class RedisDedupGate implements DedupGate {
  constructor(
    private readonly redis: RedisClient,
    private readonly ttlSeconds: number,
  ) {}

  async seen(platform: Platform, messageId: string): Promise<boolean> {
    return (await this.redis.exists(dedupKey(platform, messageId))) > 0;
  }

  async markSeen(platform: Platform, messageId: string): Promise<void> {
    await this.redis.set(dedupKey(platform, messageId), '1', { EX: this.ttlSeconds });
  }

  async claim(platform: Platform, messageId: string): Promise<boolean> {
    const set = await this.redis.set(dedupKey(platform, messageId), '1', { NX: true, EX: this.ttlSeconds });
    return set === 'OK';
  }

  async release(platform: Platform, messageId: string): Promise<void> {
    await this.redis.del(dedupKey(platform, messageId));
  }
}

/** Insertion-ordered map bounded by TTL and entry count; expired entries go lazily. */
export class InMemoryDedupGate implements DedupGate {
  private readonly expiries = new Map<string, number>();

  constructor(
    private readonly ttlMs: number,
    private readonly maxEntries: number,
    private readonly now: () => number = Date.now,
  ) {}

  async seen(platform: Platform, messageId: string): Promise<boolean> {
    return this.has(dedupKey(platform, messageId));
  }

  async markSeen(platform: Platform, messageId: string): Promise<void> {
    this.mark(dedupKey(platform, messageId));
  }

  /** Check and mark run in one synchronous step. */
  async claim(platform: Platform, messageId: string): Promise<boolean> {
    const key = dedupKey(platform, messageId);
    if (this.has(key)) return false;
    this.mark(key);
    return true;
  }

  async release(platform: Platform, messageId: string): Promise<void> {
    this.expiries.delete(dedupKey(platform, messageId));
  }

  get size(): number {
    return this.expiries.size;
  }

  private has(key: string): boolean {
    this.evict();
    return this.expiries.has(key);
  }

  private mark(key: string): void {
    this.expiries.delete(key);
    this.expiries.set(key, this.now() + this.ttlMs);
    this.evict();
  }

  private evict(): void {
    const now = this.now();
    for (const [key, expiresAt] of this.expiries) {
      if (expiresAt > now) break;
      this.expiries.delete(key);
    }
    while (this.expiries.size > this.maxEntries) {
      const oldest = this.expiries.keys().next();
      if (oldest.done) break;
      this.expiries.delete(oldest.value);
    }
  }
}
