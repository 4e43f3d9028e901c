import { config } from '@config/env.config.js';

export const redisConfig = {
  /** Closed sessions stay readable this long so re-delivered messages find them. */
  sessionTtlSeconds: Math.max(config.SESSION_TIMEOUT_MINUTES * 60 * 4, 3600),
  memoryTtlSeconds: 24 * 3600,
  prefixes: {
    session: 'session',
    memory: 'memory',
    dedup: 'dedup',
    rate: 'rate',
    lock: 'lock',
  },
} as const;

/** BullMQ wants ioredis-style connection fields rather than a URL. */
export function bullConnectionFromUrl(url: string) {
  const parsed = new URL(url);
  const db = parsed.pathname.length > 1 ? Number(parsed.pathname.slice(1)) : 0;
  return {
    host: parsed.hostname || 'localhost',
    port: parsed.port ? Number(parsed.port) : 6379,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: Number.isFinite(db) ? db : 0,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
    maxRetriesPerRequest: null,
  };
}
