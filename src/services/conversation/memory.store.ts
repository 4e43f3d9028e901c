import type {
  ConversationMemory,
  ConversationTurn,
  PendingClarification,
} from '@core/interfaces/conversation.types.js';
import type { Platform } from '@core/interfaces/message.types.js';

import type { RedisClient } from '@infra/redis/redis.client.js';
import { redisConfig } from '@infra/redis/redis.config.js';

import { ConversationMemorySchema } from './conversation.schemas.js';

/** Recent turns and the open clarification for one (platform, user). */
export interface ConversationMemoryStore {
  get(platform: Platform, userId: string): Promise<ConversationMemory>;
  record(platform: Platform, userId: string, turns: ConversationTurn[], pending: PendingClarification | undefined): Promise<void>;
}

function memoryKey(platform: Platform, userId: string): string {
  return `${redisConfig.prefixes.memory}:${platform}:${userId}`;
}

function merge(
  current: ConversationMemory,
  turns: ConversationTurn[],
  pending: PendingClarification | undefined,
  maxTurns: number,
): ConversationMemory {
  const all = [...current.turns, ...turns];
  const memory: ConversationMemory = { turns: all.slice(Math.max(0, all.length - maxTurns)) };
  if (pending) memory.pending = pending;
  return memory;
}

function parseMemory(raw: string | null): ConversationMemory {
  if (!raw) return { turns: [] };
  try {
    const parsed = ConversationMemorySchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : { turns: [] };
  } catch {
    // corrupt entries are replaced on the next write
    return { turns: [] };
  }
}

export class RedisConversationMemoryStore implements ConversationMemoryStore {
  constructor(
    private readonly redis: RedisClient,
    private readonly maxTurns: number,
    private readonly ttlSeconds = redisConfig.memoryTtlSeconds,
  ) {}

  async get(platform: Platform, userId: string): Promise<ConversationMemory> {
    return parseMemory(await this.redis.get(memoryKey(platform, userId)));
  }

  async record(
    platform: Platform,
    userId: string,
    turns: ConversationTurn[],
    pending: PendingClarification | undefined,
  ): Promise<void> {
    const current = await this.get(platform, userId);
    const next = merge(current, turns, pending, this.maxTurns);
    await this.redis.set(memoryKey(platform, userId), JSON.stringify(next), { EX: this.ttlSeconds });
  }
}

export class InMemoryConversationMemoryStore implements ConversationMemoryStore {
  private readonly entries = new Map<string, ConversationMemory>();

  constructor(private readonly maxTurns: number) {}

  async get(platform: Platform, userId: string): Promise<ConversationMemory> {
    const found = this.entries.get(memoryKey(platform, userId));
    return found ? structuredClone(found) : { turns: [] };
  }

  async record(
    platform: Platform,
    userId: string,
    turns: ConversationTurn[],
    pending: PendingClarification | undefined,
  ): Promise<void> {
    const current = await this.get(platform, userId);
    this.entries.set(memoryKey(platform, userId), merge(current, turns, pending, this.maxTurns));
  }
}
