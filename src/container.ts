import type { AppConfig } from '@config/env.config.js';

import type { LlmCapability } from '@core/interfaces/llm.types.js';
import {
  InMemoryReservationRepository,
  PgReservationRepository,
  type ReservationRepository,
} from '@core/repositories/reservation.repo.js';

import { postgresQuery, closePostgresPool } from '@infra/database/pg.client.js';
import { sendInstagramMessage } from '@infra/instagram/instagram.client.js';
import { getOpenAI, isOpenAIConfigured } from '@infra/openai/openai.client.js';
import { connectRedis, disconnectRedis, redis } from '@infra/redis/redis.client.js';
import { redisConfig } from '@infra/redis/redis.config.js';
import { isTikTokSendConfigured, sendTikTokMessage } from '@infra/tiktok/tiktok.client.js';
import { sendWhatsAppMessage } from '@infra/whatsapp/whatsapp.client.js';

import { ClassifierService } from '@services/ai/classifier.service.js';
import { OpenAILlmService } from '@services/ai/llm.service.js';
import { BookingFlowService } from '@services/booking/booking.flow.js';
import {
  InMemoryConversationMemoryStore,
  RedisConversationMemoryStore,
  type ConversationMemoryStore,
} from '@services/conversation/memory.store.js';
import { SessionSweeper } from '@services/conversation/session.sweeper.js';
import { InMemorySessionStore, RedisSessionStore, type SessionStore } from '@services/conversation/session.store.js';
import { InMemoryDedupGate, RedisDedupGate, type DedupGate } from '@services/gate/dedup.gate.js';
import { InMemoryRateLimiter, RedisRateLimiter, type RateLimiter } from '@services/gate/rate-limiter.js';
import { InstagramAdapter } from '@services/messaging/instagram.adapter.js';
import { createRegistry, type AdapterRegistry, type PlatformAdapter } from '@services/messaging/platform.adapter.js';
import { TikTokAdapter } from '@services/messaging/tiktok.adapter.js';
import { WhatsAppAdapter } from '@services/messaging/whatsapp.adapter.js';
import { MessagePipeline } from '@services/pipeline/message.pipeline.js';
import { MessageProcessor } from '@services/queue/message.processor.js';
import { BullMessageQueue, InlineMessageQueue, type MessageQueue } from '@services/queue/queue.manager.js';
import { FileReferenceSource, type ReferenceSource } from '@services/reference/reference.source.js';
import { ReferenceProvider } from '@services/reference/reference.provider.js';
import { RouterService } from '@services/routing/router.service.js';

import { KeyedMutex, RedisLock, type KeyedLock } from '@utils/locks.js';
import { logger } from '@utils/logger.js';

export interface AppContainer {
  adapters: AdapterRegistry;
  pipeline: MessagePipeline;
  processor: MessageProcessor;
  queue: MessageQueue;
  reference: ReferenceProvider;
  sweeper: SessionSweeper;
  /** Starts background work: reference refresh and the session sweep. */
  start(): void;
  shutdown(): Promise<void>;
}

/** Test seams; anything left out is built from config. */
export interface ContainerOverrides {
  llm?: LlmCapability;
  referenceSource?: ReferenceSource;
  reservations?: ReservationRepository;
  adapters?: PlatformAdapter[];
}

interface Stores {
  dedup: DedupGate;
  rateLimiter: RateLimiter;
  lock: KeyedLock;
  sessions: SessionStore;
  memory: ConversationMemoryStore;
  reservations: ReservationRepository;
}

function memoryStores(cfg: Readonly<AppConfig>): Stores {
  return {
    dedup: new InMemoryDedupGate(cfg.DEDUP_TTL_SEC * 1000, cfg.DEDUP_MAX_ENTRIES),
    rateLimiter: new InMemoryRateLimiter({ limit: cfg.RATE_LIMIT_PER_MINUTE, windowMs: cfg.RATE_LIMIT_WINDOW_SEC * 1000 }),
    lock: new KeyedMutex(),
    sessions: new InMemorySessionStore(),
    memory: new InMemoryConversationMemoryStore(cfg.CONVERSATION_MEMORY_TURNS),
    reservations: new InMemoryReservationRepository(),
  };
}

function redisStores(cfg: Readonly<AppConfig>): Stores {
  return {
    dedup: new RedisDedupGate(redis, cfg.DEDUP_TTL_SEC),
    rateLimiter: new RedisRateLimiter(redis, { limit: cfg.RATE_LIMIT_PER_MINUTE, windowMs: cfg.RATE_LIMIT_WINDOW_SEC * 1000 }),
    lock: new RedisLock(redis, { prefix: redisConfig.prefixes.lock }),
    sessions: new RedisSessionStore(redis),
    memory: new RedisConversationMemoryStore(redis, cfg.CONVERSATION_MEMORY_TURNS),
    reservations: new PgReservationRepository(postgresQuery),
  };
}

function defaultAdapters(cfg: Readonly<AppConfig>): PlatformAdapter[] {
  const requireSignature = cfg.NODE_ENV === 'production';
  return [
    new WhatsAppAdapter({
      verifyToken: cfg.WHATSAPP_VERIFY_TOKEN,
      appSecret: cfg.WHATSAPP_APP_SECRET,
      requireSignature,
      send: sendWhatsAppMessage,
    }),
    new InstagramAdapter({
      verifyToken: cfg.INSTAGRAM_VERIFY_TOKEN,
      appSecret: cfg.INSTAGRAM_APP_SECRET,
      requireSignature,
      send: sendInstagramMessage,
    }),
    new TikTokAdapter({
      appSecret: cfg.TIKTOK_APP_SECRET,
      requireSignature,
      send: sendTikTokMessage,
      sendConfigured: isTikTokSendConfigured(),
    }),
  ];
}

export async function createContainer(
  cfg: Readonly<AppConfig>,
  overrides: ContainerOverrides = {},
): Promise<AppContainer> {
  const useRedis = cfg.STORE_DRIVER === 'redis';
  if (useRedis) await connectRedis();
  const stores = useRedis ? redisStores(cfg) : memoryStores(cfg);
  const reservations = overrides.reservations ?? stores.reservations;

  const llm =
    overrides.llm ??
    new OpenAILlmService(isOpenAIConfigured() ? getOpenAI() : null, {
      intentModel: cfg.OPENAI_MODEL_INTENT,
      agentModel: cfg.OPENAI_MODEL_AGENT,
      timeoutMs: cfg.OPENAI_TIMEOUT_MS,
      temperature: cfg.OPENAI_TEMPERATURE,
    });

  const reference = new ReferenceProvider(overrides.referenceSource ?? new FileReferenceSource(cfg.REFERENCE_DATA_PATH));
  const booking = new BookingFlowService(stores.sessions, reservations, {
    fuzzyThreshold: cfg.FUZZY_MATCH_THRESHOLD,
    maxFieldAttempts: cfg.BOOKING_MAX_FIELD_ATTEMPTS,
    timeoutMinutes: cfg.SESSION_TIMEOUT_MINUTES,
    timezone: cfg.TIMEZONE,
  });

  const pipeline = new MessagePipeline(
    {
      ...stores,
      reference,
      booking,
      llm,
      classifier: new ClassifierService(llm, { fuzzyThreshold: cfg.FUZZY_MATCH_THRESHOLD, timezone: cfg.TIMEZONE }),
      router: new RouterService({ minConfidence: cfg.CLASSIFIER_MIN_CONFIDENCE }),
    },
    { defaultLocale: cfg.DEFAULT_LOCALE, timezone: cfg.TIMEZONE },
  );

  const adapters = createRegistry(overrides.adapters ?? defaultAdapters(cfg));
  const processor = new MessageProcessor(pipeline, adapters);
  const queue: MessageQueue = useRedis
    ? new BullMessageQueue(processor, {
        redisUrl: cfg.REDIS_URL,
        concurrency: cfg.QUEUE_CONCURRENCY,
        maxAttempts: cfg.QUEUE_MAX_ATTEMPTS,
      })
    : new InlineMessageQueue(processor);

  const sweeper = new SessionSweeper(
    stores.sessions,
    booking,
    stores.lock,
    async (session, text) => {
      const adapter = adapters.get(session.platform);
      if (adapter) await adapter.sendOutbound(session.userId, text);
    },
    cfg.DEFAULT_LOCALE,
  );

  logger.info('[container] ready', { storeDriver: cfg.STORE_DRIVER, llm: isOpenAIConfigured() });

  return {
    adapters,
    pipeline,
    processor,
    queue,
    reference,
    sweeper,
    start() {
      reference.start(cfg.REFERENCE_REFRESH_MINUTES * 60_000);
      sweeper.start(Math.max(1, Math.floor(cfg.SESSION_TIMEOUT_MINUTES / 3)) * 60_000);
    },
    async shutdown() {
      reference.stop();
      sweeper.stop();
      await queue.close();
      if (useRedis) {
        await closePostgresPool();
        await disconnectRedis();
      }
    },
  };
}
