import type {
  BookingSession,
  ClassificationResult,
  ConversationMemory,
  ConversationTurn,
  InboundMessage,
  Intent,
  LlmCapability,
  Locale,
  PendingClarification,
  ReferenceSnapshot,
  RouteOutcome,
  RoutingDecision,
} from '@core/interfaces/index.js';
import { ReferenceDataUnavailableError } from '@core/errors/index.js';

import type { ClassifierService } from '@services/ai/classifier.service.js';
import type { BookingFlowService, BookingStepResult } from '@services/booking/booking.flow.js';
import type { ConversationMemoryStore } from '@services/conversation/memory.store.js';
import type { SessionStore } from '@services/conversation/session.store.js';
import {
  formatBookingStep,
  formatDecision,
  formatPersistenceFailure,
  formatThrottleNotice,
} from '@services/formatter/formatter.js';
import { detectLocale, message } from '@services/formatter/templates.js';
import type { DedupGate } from '@services/gate/dedup.gate.js';
import type { RateLimiter } from '@services/gate/rate-limiter.js';
import type { ReferenceProvider } from '@services/reference/reference.provider.js';
import type { RouterService } from '@services/routing/router.service.js';

import type { KeyedLock } from '@utils/locks.js';
import { logger } from '@utils/logger.js';
import { nowISO, todayISO } from '@utils/time.js';

import { buildFacts } from './facts.js';

export type ReplyPath = 'direct' | 'clarify' | 'escalate' | 'booking';

export type PipelineOutcome =
  | { kind: 'duplicate' }
  | { kind: 'rate_limited'; notify: boolean; text?: string }
  | { kind: 'reply'; text: string; path: ReplyPath; intent: Intent; classification: ClassificationResult }
  | { kind: 'failure'; reason: 'persistence'; text: string };

export interface PipelineDeps {
  dedup: DedupGate;
  rateLimiter: RateLimiter;
  lock: KeyedLock;
  sessions: SessionStore;
  memory: ConversationMemoryStore;
  reference: ReferenceProvider;
  classifier: ClassifierService;
  router: RouterService;
  booking: BookingFlowService;
  llm: LlmCapability;
}

export interface PipelineOptions {
  defaultLocale: Locale;
  timezone: string;
}

interface Handled {
  text: string;
  path: ReplyPath;
  intent: Intent;
  pending?: PendingClarification;
  failure?: 'persistence';
}

/**
 * Dedup → rate limit → (per-user lock) classify → route → booking step or
 * formatted decision. Returns the text to send; delivery is the caller's job.
 */
export class MessagePipeline {
  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: PipelineOptions,
  ) {}

  async handle(msg: InboundMessage): Promise<PipelineOutcome> {
    const { dedup, rateLimiter, lock } = this.deps;

    if (!(await dedup.claim(msg.platform, msg.platformMessageId))) {
      logger.debug('[pipeline] duplicate dropped', { platform: msg.platform, messageId: msg.platformMessageId });
      return { kind: 'duplicate' };
    }

    try {
      const locale = detectLocale(msg.text, this.options.defaultLocale);
      const rate = await rateLimiter.check(msg.platform, msg.senderId);
      if (rate !== 'allowed') {
        logger.info('[pipeline] rate limited', { platform: msg.platform, decision: rate });
        return rate === 'throttled_notify'
          ? { kind: 'rate_limited', notify: true, text: formatThrottleNotice(locale) }
          : { kind: 'rate_limited', notify: false };
      }

      return await lock.withLock(`${msg.platform}:${msg.senderId}`, () => this.process(msg, locale));
    } catch (err) {
      // let a platform retry reprocess this message
      await dedup.release(msg.platform, msg.platformMessageId);
      throw err;
    }
  }

  private async process(msg: InboundMessage, locale: Locale): Promise<PipelineOutcome> {
    const { sessions, memory: memoryStore } = this.deps;
    const [memory, stored] = await Promise.all([
      memoryStore.get(msg.platform, msg.senderId),
      sessions.get(msg.platform, msg.senderId),
    ]);

    const notices: string[] = [];
    let session = stored;
    const expired = await this.deps.booking.expireIfStale(session);
    if (expired) {
      if (expired.failure) return this.persistenceFailure(msg, locale);
      session = expired.session;
      notices.push(message('booking_timeout', locale));
    }

    const snapshot = await this.snapshot();
    const classification = await this.deps.classifier.classify({ text: msg.text, memory, snapshot });
    const outcome = this.deps.router.route({
      text: msg.text,
      classification,
      snapshot,
      session,
      pending: memory.pending,
      today: todayISO(this.options.timezone),
    });

    const handled =
      outcome.kind === 'booking'
        ? await this.runBooking(msg, outcome, session, snapshot, locale)
        : await this.renderDecision(msg, outcome, memory, snapshot, locale);

    if (handled.failure) return this.persistenceFailure(msg, locale);

    const text = [...notices, handled.text].join('\n\n');
    await this.remember(msg, text, handled.pending);

    logger.info('[pipeline] reply ready', {
      platform: msg.platform,
      messageId: msg.platformMessageId,
      intent: classification.intent,
      source: classification.source,
      path: handled.path,
    });
    return { kind: 'reply', text, path: handled.path, intent: handled.intent, classification };
  }

  private async snapshot(): Promise<ReferenceSnapshot | null> {
    try {
      return await this.deps.reference.current();
    } catch (err) {
      if (err instanceof ReferenceDataUnavailableError) {
        logger.warn('[pipeline] reference data unavailable', { err });
        return null;
      }
      throw err;
    }
  }

  private async runBooking(
    msg: InboundMessage,
    outcome: Extract<RouteOutcome, { kind: 'booking' }>,
    session: BookingSession | null,
    snapshot: ReferenceSnapshot | null,
    locale: Locale,
  ): Promise<Handled> {
    if (!snapshot) {
      return { text: message('escalate_fallback', locale), path: 'escalate', intent: 'booking_request' };
    }

    let step: BookingStepResult;
    if (outcome.action === 'continue' && session) {
      step = await this.deps.booking.step({ action: 'continue', session, text: msg.text }, snapshot);
    } else {
      const prefill = outcome.action === 'start' ? outcome.prefill : {};
      step = await this.deps.booking.step(
        { action: 'start', platform: msg.platform, userId: msg.senderId, prefill, previous: session },
        snapshot,
      );
    }

    if (step.failure) {
      return { text: '', path: 'booking', intent: 'booking_request', failure: step.failure };
    }
    return { text: formatBookingStep(step, { snapshot, locale }), path: 'booking', intent: 'booking_request' };
  }

  private async renderDecision(
    msg: InboundMessage,
    outcome: Extract<RouteOutcome, { kind: 'decision' }>,
    memory: ConversationMemory,
    snapshot: ReferenceSnapshot | null,
    locale: Locale,
  ): Promise<Handled> {
    const { decision } = outcome;
    const generated = await this.generateFor(decision, msg, outcome, memory, snapshot, locale);
    const text = formatDecision(decision, { snapshot, locale }, generated);

    const pending: PendingClarification | undefined =
      decision.type === 'clarify'
        ? {
            intent: outcome.intent,
            entities: outcome.entities,
            missingField: decision.missingField,
            options: decision.prompt.options,
            askedAt: nowISO(),
          }
        : undefined;

    return { text, path: decision.type, intent: outcome.intent, pending };
  }

  /** Only escalations reach the model; a failed call falls back to the fixed reply. */
  private async generateFor(
    decision: RoutingDecision,
    msg: InboundMessage,
    outcome: Extract<RouteOutcome, { kind: 'decision' }>,
    memory: ConversationMemory,
    snapshot: ReferenceSnapshot | null,
    locale: Locale,
  ): Promise<string | null> {
    if (decision.type !== 'escalate' || decision.context.reason === 'reference_unavailable') return null;
    const result = await this.deps.llm.generate({
      text: msg.text,
      locale,
      history: memory.turns,
      facts: buildFacts(snapshot, outcome.entities),
    });
    if (!result.ok) {
      logger.info('[pipeline] escalation using fallback reply', { kind: result.failure.kind });
      return null;
    }
    return result.value;
  }

  private async persistenceFailure(msg: InboundMessage, locale: Locale): Promise<PipelineOutcome> {
    // the stored session is unchanged; the same message may be processed again
    await this.deps.dedup.release(msg.platform, msg.platformMessageId);
    return { kind: 'failure', reason: 'persistence', text: formatPersistenceFailure(locale) };
  }

  private async remember(msg: InboundMessage, reply: string, pending: PendingClarification | undefined): Promise<void> {
    const at = nowISO();
    const turns: ConversationTurn[] = [
      { role: 'user', text: msg.text, at: msg.receivedAt },
      { role: 'assistant', text: reply, at },
    ];
    try {
      await this.deps.memory.record(msg.platform, msg.senderId, turns, pending);
    } catch (err) {
      logger.warn('[pipeline] conversation memory not recorded', { platform: msg.platform, err });
    }
  }
}
