import { randomUUID } from 'crypto';

import { DateTime } from 'luxon';

import type { BookingSession, Reservation } from '@core/interfaces/booking.types.js';
import { isOpen } from '@core/interfaces/booking.types.js';
import type { Platform } from '@core/interfaces/message.types.js';
import type { ReferenceSnapshot } from '@core/interfaces/reference.types.js';
import type { BookingPrefill } from '@core/interfaces/routing.types.js';
import type { ReservationRepository } from '@core/repositories/reservation.repo.js';

import type { SessionStore } from '@services/conversation/session.store.js';

import { logger } from '@utils/logger.js';
import { minutesSince } from '@utils/time.js';

import { BookingMachine, newSession, type BookingEffect, type ReduceResult } from './booking.machine.js';

export interface BookingFlowOptions {
  fuzzyThreshold: number;
  maxFieldAttempts: number;
  timeoutMinutes: number;
  timezone: string;
}

export type BookingStepRequest =
  | { action: 'start'; platform: Platform; userId: string; prefill: BookingPrefill; previous: BookingSession | null }
  | { action: 'continue'; session: BookingSession; text: string };

export interface BookingStepResult {
  session: BookingSession;
  effects: BookingEffect[];
  reservation?: Reservation;
  /** Set when a write failed; the stored session is left as it was. */
  failure?: 'persistence';
}

/**
 * Runs one booking step: reduce, create the reservation when the machine asks for
 * it, then save. Callers hold the per-user lock.
 */
export class BookingFlowService {
  constructor(
    private readonly sessions: SessionStore,
    private readonly reservations: ReservationRepository,
    private readonly options: BookingFlowOptions,
    private readonly machine = new BookingMachine(),
    private readonly newId: () => string = randomUUID,
  ) {}

  isStale(session: BookingSession, now: DateTime = DateTime.now()): boolean {
    return isOpen(session) && minutesSince(session.updatedAt, now) > this.options.timeoutMinutes;
  }

  /** Closes an open session that has been idle past the timeout. */
  async expireIfStale(session: BookingSession | null): Promise<BookingStepResult | null> {
    if (!session || !this.isStale(session)) return null;
    const result = this.machine.expire(session, new Date().toISOString());
    logger.info('[booking] session timed out', { sessionId: session.id, state: session.state });
    return this.persist(session, result);
  }

  async step(request: BookingStepRequest, snapshot: ReferenceSnapshot): Promise<BookingStepResult> {
    const at = new Date().toISOString();
    const ctx = {
      snapshot,
      today: DateTime.now().setZone(this.options.timezone),
      fuzzyThreshold: this.options.fuzzyThreshold,
      maxFieldAttempts: this.options.maxFieldAttempts,
    };

    if (request.action === 'start') {
      const fresh = newSession(this.newId(), request.platform, request.userId, at);
      const base = { ...fresh, version: request.previous?.version ?? 0 };
      logger.info('[booking] session started', { sessionId: base.id, platform: base.platform });
      return this.persist(base, this.machine.reduce(base, { type: 'START', prefill: request.prefill, at }, ctx));
    }

    const { session } = request;
    if (!isOpen(session)) return { session, effects: [] };
    return this.persist(session, this.machine.reduce(session, { type: 'MESSAGE', text: request.text, at }, ctx));
  }

  private async persist(before: BookingSession, result: ReduceResult): Promise<BookingStepResult> {
    let next = result.session;
    let reservation: Reservation | undefined;

    try {
      for (const effect of result.effects) {
        if (effect.type !== 'CREATE_RESERVATION') continue;
        reservation = await this.reservations.create(effect.draft, next.id);
        next = { ...next, reservationId: reservation.id, closedReason: 'completed' };
        logger.info('[booking] reservation created', { sessionId: next.id, reservationId: reservation.id });
      }
      const saved = await this.sessions.save(next);
      return { session: saved, effects: result.effects, reservation };
    } catch (err) {
      logger.error('[booking] persistence failed, session not advanced', {
        sessionId: before.id,
        state: before.state,
        err,
      });
      return { session: before, effects: [], failure: 'persistence' };
    }
  }
}
