import { InMemoryReservationRepository } from '@core/repositories/reservation.repo.js';
import type { InboundMessage, Platform } from '@core/interfaces/message.types.js';

import { ClassifierService } from '@services/ai/classifier.service.js';
import { BookingFlowService } from '@services/booking/booking.flow.js';
import { BookingMachine } from '@services/booking/booking.machine.js';
import { InMemoryConversationMemoryStore } from '@services/conversation/memory.store.js';
import { InMemorySessionStore } from '@services/conversation/session.store.js';
import { InMemoryDedupGate } from '@services/gate/dedup.gate.js';
import { InMemoryRateLimiter } from '@services/gate/rate-limiter.js';
import { toInbound } from '@services/messaging/platform.adapter.js';
import { MessagePipeline } from '@services/pipeline/message.pipeline.js';
import { ReferenceProvider } from '@services/reference/reference.provider.js';
import type { ReferenceSource } from '@services/reference/reference.source.js';
import { RouterService } from '@services/routing/router.service.js';

import { KeyedMutex } from '@utils/locks.js';

import { fakeLlm } from './fake-llm.js';
import { FIXED_NOW, StaticReferenceSource } from './reference.fixture.js';

export interface HarnessOptions {
  rateLimit?: number;
  referenceSource?: ReferenceSource;
}

/** A pipeline wired to in-process stores, the fixture reference data and a fake LLM. */
export function buildPipeline(options: HarnessOptions = {}) {
  const llm = fakeLlm();
  const sessions = new InMemorySessionStore();
  const memory = new InMemoryConversationMemoryStore(10);
  const reservations = new InMemoryReservationRepository();
  const dedup = new InMemoryDedupGate(86_400_000, 1000);
  const rateLimiter = new InMemoryRateLimiter({ limit: options.rateLimit ?? 100, windowMs: 60_000 });
  const lock = new KeyedMutex();
  const reference = new ReferenceProvider(options.referenceSource ?? new StaticReferenceSource());
  let sessionCount = 0;
  const booking = new BookingFlowService(
    sessions,
    reservations,
    { fuzzyThreshold: 0.72, maxFieldAttempts: 3, timeoutMinutes: 30, timezone: 'Asia/Riyadh' },
    new BookingMachine(),
    () => `session-${++sessionCount}`,
  );
  const pipeline = new MessagePipeline(
    {
      dedup,
      rateLimiter,
      lock,
      sessions,
      memory,
      reference,
      booking,
      llm,
      classifier: new ClassifierService(llm, { fuzzyThreshold: 0.72, timezone: 'Asia/Riyadh' }),
      router: new RouterService({ minConfidence: 0.6 }),
    },
    { defaultLocale: 'ar', timezone: 'Asia/Riyadh' },
  );
  return { pipeline, llm, sessions, memory, reservations, dedup, lock, reference, booking };
}

let sequence = 0;

export function inbound(text: string, senderId = '966500000001', platform: Platform = 'whatsapp', messageId?: string): InboundMessage {
  sequence += 1;
  return toInbound(platform, senderId, text, messageId ?? `msg-${sequence}`, FIXED_NOW.toISOString());
}
