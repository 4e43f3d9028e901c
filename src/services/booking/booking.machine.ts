import type { DateTime } from 'luxon';

import type {
  BookingField,
  BookingFields,
  BookingSession,
  BookingState,
  ClosedReason,
  ReservationDraft,
} from '@core/interfaces/booking.types.js';
import { BOOKING_STEPS, isOpen } from '@core/interfaces/booking.types.js';
import type { Platform } from '@core/interfaces/message.types.js';
import type { ReferenceSnapshot } from '@core/interfaces/reference.types.js';
import type { BookingPrefill } from '@core/interfaces/routing.types.js';

import { normalizeText } from '@utils/text.js';

import {
  branchOptions,
  isNotPast,
  validateBranch,
  validateDateTime,
  validateName,
  validatePhone,
  validateService,
  type FieldResult,
} from './field.validators.js';

export type BookingEvent =
  | { type: 'START'; prefill: BookingPrefill; at: string }
  | { type: 'MESSAGE'; text: string; at: string }
  | { type: 'CANCEL'; at: string }
  | { type: 'TIMEOUT'; at: string };

export type AskReason = 'first' | 'invalid' | 'ambiguous';

export type BookingEffect =
  | { type: 'ASK_FIELD'; field: BookingField; reason: AskReason; candidates: string[] }
  | { type: 'CREATE_RESERVATION'; draft: ReservationDraft }
  | { type: 'CLOSED'; reason: Exclude<ClosedReason, 'completed'> };

export interface ReduceResult {
  session: BookingSession;
  effects: BookingEffect[];
}

export interface MachineContext {
  snapshot: ReferenceSnapshot;
  today: DateTime;
  fuzzyThreshold: number;
  maxFieldAttempts: number;
}

const CANCEL_WORDS = new Set(
  ['الغاء', 'إلغاء', 'الغي', 'خروج', 'لا أريد', 'ما ابي', 'ما ابغى', 'cancel', 'stop', 'exit', 'quit'].map(
    normalizeText,
  ),
);

export function isCancelRequest(text: string): boolean {
  const norm = normalizeText(text);
  return CANCEL_WORDS.has(norm) || norm.startsWith('الغاء ') || norm.startsWith('cancel ');
}

/** First step whose field is still undefined; `null` counts as answered (declined). */
export function nextStep(fields: BookingFields): BookingField | 'done' {
  for (const step of BOOKING_STEPS) {
    if (valueOf(fields, step) === undefined) return step;
  }
  return 'done';
}

function valueOf(fields: BookingFields, step: BookingField): string | null | undefined {
  switch (step) {
    case 'name':
      return fields.name;
    case 'phone':
      return fields.phone;
    case 'service':
      return fields.serviceId;
    case 'branch':
      return fields.branchId;
    case 'date_time':
      return fields.dateTime;
  }
}

function assign(fields: BookingFields, step: BookingField, value: string | null): BookingFields {
  switch (step) {
    case 'name':
      return value === null ? fields : { ...fields, name: value };
    case 'phone':
      return value === null ? fields : { ...fields, phone: value };
    case 'service':
      return value === null ? fields : { ...fields, serviceId: value };
    case 'branch':
      return { ...fields, branchId: value };
    case 'date_time':
      return { ...fields, dateTime: value };
  }
}

export function newSession(id: string, platform: Platform, userId: string, at: string): BookingSession {
  return {
    id,
    platform,
    userId,
    state: 'name',
    fields: {},
    attempts: 0,
    version: 0,
    createdAt: at,
    updatedAt: at,
  };
}

function toDraft(session: BookingSession): ReservationDraft | null {
  const { name, phone, serviceId, doctorId, branchId, dateTime } = session.fields;
  if (!name || !phone || !serviceId) return null;
  return {
    platform: session.platform,
    userId: session.userId,
    name,
    phone,
    serviceId,
    doctorId: doctorId ?? null,
    branchId: branchId ?? null,
    requestedAt: dateTime ?? null,
  };
}

/**
 * Pure booking reducer. Fields are collected in a fixed order; an invalid answer
 * re-asks the same field and touches nothing else.
 */
export class BookingMachine {
  reduce(session: BookingSession, event: BookingEvent, ctx: MachineContext): ReduceResult {
    switch (event.type) {
      case 'START':
        return this.start(session, event.prefill, event.at, ctx);
      case 'CANCEL':
        return this.close(session, 'user_cancelled', event.at);
      case 'TIMEOUT':
        return this.expire(session, event.at);
      case 'MESSAGE':
        if (!isOpen(session)) return { session, effects: [] };
        if (isCancelRequest(event.text)) return this.close(session, 'user_cancelled', event.at);
        return this.answer(session, event.text, event.at, ctx);
    }
  }

  /** Inactivity timeout; needs no reference data. */
  expire(session: BookingSession, at: string): ReduceResult {
    return this.close(session, 'timeout', at);
  }

  private start(session: BookingSession, prefill: BookingPrefill, at: string, ctx: MachineContext): ReduceResult {
    const fields: BookingFields = { ...session.fields };
    if (prefill.doctorId && ctx.snapshot.doctors.has(prefill.doctorId)) fields.doctorId = prefill.doctorId;
    if (prefill.serviceId && ctx.snapshot.services.has(prefill.serviceId)) fields.serviceId = prefill.serviceId;
    if (prefill.branchId && branchOptions(ctx.snapshot, fields.serviceId).includes(prefill.branchId)) {
      fields.branchId = prefill.branchId;
    }
    if (prefill.dateTime && isNotPast(prefill.dateTime, ctx.today)) fields.dateTime = prefill.dateTime;
    return this.advance({ ...session, fields, attempts: 0, pendingChoice: undefined, updatedAt: at }, ctx);
  }

  private close(session: BookingSession, reason: Exclude<ClosedReason, 'completed'>, at: string): ReduceResult {
    if (!isOpen(session)) return { session, effects: [] };
    return {
      session: { ...session, state: 'cancelled', closedReason: reason, pendingChoice: undefined, updatedAt: at },
      effects: [{ type: 'CLOSED', reason }],
    };
  }

  private answer(session: BookingSession, text: string, at: string, ctx: MachineContext): ReduceResult {
    const step = session.state;
    if (step === 'done' || step === 'cancelled') return { session, effects: [] };

    const offered = session.pendingChoice?.field === step ? session.pendingChoice.candidateIds : undefined;
    const result = this.validate(step, text, session.fields, offered, ctx);
    const touched = { ...session, updatedAt: at };

    if (result.status === 'ok' || result.status === 'skipped') {
      const value = result.status === 'ok' ? result.value : null;
      return this.advance(
        { ...touched, fields: assign(session.fields, step, value), attempts: 0, pendingChoice: undefined },
        ctx,
      );
    }

    const attempts = session.attempts + 1;
    if (attempts >= ctx.maxFieldAttempts) {
      return this.close({ ...touched, attempts }, 'too_many_attempts', at);
    }
    if (result.status === 'ambiguous') {
      return {
        session: { ...touched, attempts, pendingChoice: { field: step, candidateIds: result.candidates } },
        effects: [{ type: 'ASK_FIELD', field: step, reason: 'ambiguous', candidates: result.candidates }],
      };
    }
    return {
      session: { ...touched, attempts },
      effects: [{ type: 'ASK_FIELD', field: step, reason: 'invalid', candidates: this.candidatesFor(step, touched, ctx) }],
    };
  }

  private validate(
    step: BookingField,
    text: string,
    fields: BookingFields,
    offered: string[] | undefined,
    ctx: MachineContext,
  ): FieldResult<string> {
    switch (step) {
      case 'name':
        return validateName(text);
      case 'phone':
        return validatePhone(text);
      case 'service':
        return validateService(text, ctx.snapshot, ctx.fuzzyThreshold, offered);
      case 'branch':
        return validateBranch(text, ctx.snapshot, ctx.fuzzyThreshold, fields.serviceId, offered);
      case 'date_time':
        return validateDateTime(text, ctx.today);
    }
  }

  private advance(session: BookingSession, ctx: MachineContext): ReduceResult {
    const state = nextStep(session.fields);
    if (state === 'done') {
      const draft = toDraft(session);
      if (!draft) throw new Error(`Booking session ${session.id} completed without required fields`);
      return {
        session: { ...session, state: 'done' },
        effects: session.reservationId ? [] : [{ type: 'CREATE_RESERVATION', draft }],
      };
    }
    const next = { ...session, state };
    const candidates = this.candidatesFor(state, next, ctx);
    return {
      session: candidates.length && state !== 'name' && state !== 'phone'
        ? { ...next, pendingChoice: { field: state, candidateIds: candidates } }
        : next,
      effects: [{ type: 'ASK_FIELD', field: state, reason: 'first', candidates }],
    };
  }

  /** Numbered options shown with a prompt: branches for the chosen service. */
  private candidatesFor(step: BookingState, session: BookingSession, ctx: MachineContext): string[] {
    if (step === 'branch') return branchOptions(ctx.snapshot, session.fields.serviceId);
    return [];
  }
}
