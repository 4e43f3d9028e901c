import { randomUUID } from 'crypto';
import { setTimeout as sleep } from 'timers/promises';

import type { RedisClient } from '@infra/redis/redis.client.js';

import { ConflictError } from '@core/errors/conflict.error.js';

export interface KeyedLock {
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

/** Serializes work per key inside one process; different keys run in parallel. */
export class KeyedMutex implements KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  get size(): number {
    return this.tails.size;
  }
}

const RELEASE_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

export interface RedisLockOptions {
  ttlMs?: number;
  waitMs?: number;
  retryMs?: number;
  prefix?: string;
}

/** Token lock (`SET NX PX`) shared by all workers; released only by its owner. */
export class RedisLock implements KeyedLock {
  private readonly ttlMs: number;
  private readonly waitMs: number;
  private readonly retryMs: number;
  private readonly prefix: string;

  constructor(
    private readonly redis: RedisClient,
    options: RedisLockOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? 30_000;
    this.waitMs = options.waitMs ?? 10_000;
    this.retryMs = options.retryMs ?? 50;
    this.prefix = options.prefix ?? 'lock';
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const lockKey = `${this.prefix}:${key}`;
    const token = randomUUID();
    const deadline = Date.now() + this.waitMs;

    while ((await this.redis.set(lockKey, token, { NX: true, PX: this.ttlMs })) !== 'OK') {
      if (Date.now() >= deadline) {
        throw new ConflictError('Could not acquire lock', { key });
      }
      await sleep(this.retryMs);
    }

    try {
      return await fn();
    } finally {
      await this.redis.eval(RELEASE_SCRIPT, { keys: [lockKey], arguments: [token] });
    }
  }
}
