import type { BookingSession } from '@core/interfaces/booking.types.js';
import { isOpen } from '@core/interfaces/booking.types.js';
import type { Platform } from '@core/interfaces/message.types.js';

import { ConflictError } from '@core/errors/conflict.error.js';

import type { RedisClient } from '@infra/redis/redis.client.js';
import { redisConfig } from '@infra/redis/redis.config.js';

import { BookingSessionSchema } from './conversation.schemas.js';

export interface SessionStore {
  get(platform: Platform, userId: string): Promise<BookingSession | null>;
  /**
   * Writes `session` if the stored version still equals `session.version`
   * and returns it with the version incremented. Throws ConflictError otherwise.
   */
  save(session: BookingSession): Promise<BookingSession>;
  listOpen(): AsyncIterable<BookingSession>;
}

function sessionKey(platform: Platform, userId: string): string {
  return `${redisConfig.prefixes.session}:${platform}:${userId}`;
}

function safeParse(raw: string | null): BookingSession | null {
  if (!raw) return null;
  try {
    const parsed = BookingSessionSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

const LUA_CAS_SET = `
-- KEYS[1] = key, ARGV[1] = expected version, ARGV[2] = json, ARGV[3] = ttl
local current = redis.call('GET', KEYS[1])
local expected = tonumber(ARGV[1])
if current then
  local ok, obj = pcall(cjson.decode, current)
  if not ok then return -2 end
  local ver = tonumber(obj['version']) or 0
  if ver ~= expected then return 0 end
elseif expected ~= 0 then
  return -1
end
redis.call('SET', KEYS[1], ARGV[2], 'EX', tonumber(ARGV[3]))
return 1
`;

export class RedisSessionStore implements SessionStore {
  constructor(
    private readonly redis: RedisClient,
    private readonly ttlSeconds = redisConfig.sessionTtlSeconds,
  ) {}

  async get(platform: Platform, userId: string): Promise<BookingSession | null> {
    return safeParse(await this.redis.get(sessionKey(platform, userId)));
  }

  async save(session: BookingSession): Promise<BookingSession> {
    const next: BookingSession = { ...session, version: session.version + 1 };
    const code = await this.redis.eval(LUA_CAS_SET, {
      keys: [sessionKey(session.platform, session.userId)],
      arguments: [String(session.version), JSON.stringify(next), String(this.ttlSeconds)],
    });
    if (code !== 1) {
      throw new ConflictError('Booking session was modified concurrently', {
        sessionId: session.id,
        expectedVersion: session.version,
        code,
      });
    }
    return next;
  }

  async *listOpen(): AsyncIterable<BookingSession> {
    for await (const key of this.redis.scanIterator({ MATCH: `${redisConfig.prefixes.session}:*`, COUNT: 200 })) {
      if (typeof key !== 'string') continue;
      const session = safeParse(await this.redis.get(key));
      if (isOpen(session)) yield session;
    }
  }
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, BookingSession>();

  async get(platform: Platform, userId: string): Promise<BookingSession | null> {
    const found = this.sessions.get(sessionKey(platform, userId));
    return found ? structuredClone(found) : null;
  }

  async save(session: BookingSession): Promise<BookingSession> {
    const key = sessionKey(session.platform, session.userId);
    const storedVersion = this.sessions.get(key)?.version ?? 0;
    if (storedVersion !== session.version) {
      throw new ConflictError('Booking session was modified concurrently', {
        sessionId: session.id,
        expectedVersion: session.version,
      });
    }
    const next: BookingSession = { ...session, version: session.version + 1 };
    this.sessions.set(key, structuredClone(next));
    return next;
  }

  async *listOpen(): AsyncIterable<BookingSession> {
    for (const session of Array.from(this.sessions.values())) {
      if (isOpen(session)) yield structuredClone(session);
    }
  }
}
