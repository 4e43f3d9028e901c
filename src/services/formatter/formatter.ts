import { DateTime } from 'luxon';

import type { BookingField, BookingSession, Reservation, ReservationDraft } from '@core/interfaces/booking.types.js';
import type { InfoTopic, ReferenceField, ReferenceKind } from '@core/interfaces/classification.types.js';
import type { Locale } from '@core/interfaces/message.types.js';
import type { ReferenceSnapshot } from '@core/interfaces/reference.types.js';
import type { ClarifyPrompt, DirectPayload, RoutingDecision } from '@core/interfaces/routing.types.js';

import { displayName } from '@services/ai/entity.extractor.js';
import type { BookingEffect } from '@services/booking/booking.machine.js';

import { message, weekdayName, type MessageKey } from './templates.js';

export const MAX_REPLY_CHARS = 1000;

export interface FormatContext {
  snapshot: ReferenceSnapshot | null;
  locale: Locale;
}

/** `2026-10-19` → `الاثنين 2026-10-19`; anything unparsable is returned as is. */
export function formatDate(iso: string, locale: Locale): string {
  const [datePart, timePart] = iso.split(' ');
  const dt = DateTime.fromISO(datePart ?? '');
  if (!dt.isValid) return iso;
  const day = `${weekdayName(dt.weekday, locale)} ${datePart}`;
  return timePart ? `${day} ${timePart}` : day;
}

function numbered(items: string[]): string {
  return items.map((item, i) => `${i + 1}. ${item}`).join('\n');
}

function lines(...parts: Array<string | null | undefined | false>): string {
  return parts.filter((p): p is string => typeof p === 'string' && p.length > 0).join('\n');
}

function formatPrice(snapshot: ReferenceSnapshot, serviceId: string, branchId: string | undefined, locale: Locale): string {
  const service = snapshot.services.get(serviceId);
  if (!service) return message('escalate_fallback', locale);
  const name = service.name;
  const head =
    service.priceSar !== null
      ? message('price', locale, { service: name, price: service.priceSar })
      : service.priceRange
        ? message('price_range', locale, { service: name, range: service.priceRange })
        : message('price_on_consultation', locale, { service: name });
  const branch = branchId ? snapshot.branches.get(branchId) : undefined;
  const offered = !branch || service.branchIds.length === 0 || service.branchIds.includes(branch.id);
  return lines(head, !offered && branch && message('price_not_at_branch', locale, { branch: branch.name }));
}

function formatListing(snapshot: ReferenceSnapshot, topic: InfoTopic, locale: Locale): string {
  const branches = [...snapshot.branches.values()];
  switch (topic) {
    case 'doctors':
      return lines(
        message('list_doctors', locale),
        numbered([...snapshot.doctors.values()].map((d) => `${d.name} (${d.specialty})`)),
      );
    case 'services':
      return lines(
        message('list_services', locale),
        numbered(
          [...snapshot.services.values()].map((s) =>
            s.priceSar !== null ? `${s.name}: ${s.priceSar}` : s.priceRange ? `${s.name}: ${s.priceRange}` : s.name,
          ),
        ),
      );
    case 'branches':
      return lines(message('list_branches', locale), numbered(branches.map((b) => `${b.name}: ${b.address}، ${b.city}`)));
    case 'hours':
      return lines(
        message('list_hours', locale),
        numbered(branches.map((b) => `${b.name}: ${b.hoursWeekdays} / ${b.hoursWeekend}`)),
      );
    case 'contact':
      return lines(message('list_contact', locale), numbered(branches.map((b) => `${b.name}: ${b.phone}`)));
  }
}

function formatDirect(payload: DirectPayload, snapshot: ReferenceSnapshot | null, locale: Locale): string {
  if (payload.kind === 'greeting') return message('greeting', locale);
  if (!snapshot) return message('escalate_fallback', locale);

  switch (payload.kind) {
    case 'availability': {
      const vars = {
        doctor: displayName(snapshot, 'doctor', payload.doctorId),
        date: formatDate(payload.date, locale),
      };
      return lines(
        message(payload.available ? 'availability_yes' : 'availability_no', locale, vars),
        payload.note && message('availability_note', locale, { note: payload.note }),
      );
    }
    case 'schedule': {
      const doctor = snapshot.doctors.get(payload.doctorId);
      if (!doctor) return message('escalate_fallback', locale);
      return message('schedule', locale, {
        doctor: doctor.name,
        date: formatDate(payload.date, locale),
        days: doctor.days,
        from: doctor.timeFrom,
        to: doctor.timeTo,
        branch: displayName(snapshot, 'branch', doctor.branchId),
      });
    }
    case 'price':
      return formatPrice(snapshot, payload.serviceId, payload.branchId, locale);
    case 'doctor_info': {
      const doctor = snapshot.doctors.get(payload.doctorId);
      if (!doctor) return message('escalate_fallback', locale);
      return lines(
        message('doctor_info', locale, {
          doctor: doctor.name,
          specialty: doctor.specialty,
          branch: displayName(snapshot, 'branch', doctor.branchId),
          days: doctor.days,
          from: doctor.timeFrom,
          to: doctor.timeTo,
        }),
        doctor.experienceYears !== undefined && message('doctor_experience', locale, { years: doctor.experienceYears }),
        doctor.qualifications,
      );
    }
    case 'branch_info': {
      const branch = snapshot.branches.get(payload.branchId);
      if (!branch) return message('escalate_fallback', locale);
      return lines(
        message('branch_info', locale, {
          branch: branch.name,
          address: branch.address,
          city: branch.city,
          phone: branch.phone,
          weekdays: branch.hoursWeekdays,
          weekend: branch.hoursWeekend,
        }),
        branch.mapsUrl && message('branch_maps', locale, { url: branch.mapsUrl }),
      );
    }
    case 'service_info': {
      const service = snapshot.services.get(payload.serviceId);
      if (!service) return message('escalate_fallback', locale);
      return lines(
        message('service_info', locale, { service: service.name, description: service.description }),
        formatPrice(snapshot, service.id, undefined, locale),
        service.durationMinutes !== undefined &&
          message('service_duration', locale, { minutes: service.durationMinutes }),
        service.preparationRequired &&
          message('service_preparation', locale, { preparation: service.preparationRequired }),
      );
    }
    case 'listing':
      return formatListing(snapshot, payload.topic, locale);
  }
}

const CLARIFY_KEYS: Record<ReferenceField, MessageKey> = {
  doctor: 'clarify_doctor',
  service: 'clarify_service',
  branch: 'clarify_branch',
};

function formatClarify(field: ReferenceField, prompt: ClarifyPrompt, ctx: FormatContext): string {
  const { locale, snapshot } = ctx;
  const head =
    prompt.reason === 'ambiguous' && prompt.raw
      ? message('clarify_ambiguous', locale, { raw: prompt.raw })
      : prompt.reason === 'not_found' && prompt.raw
        ? lines(message('clarify_not_found', locale, { raw: prompt.raw }), message(CLARIFY_KEYS[field], locale))
        : message(CLARIFY_KEYS[field], locale);
  if (!prompt.options.length) return head;
  const names = prompt.options.map((id) => (snapshot ? displayName(snapshot, field, id) : id));
  return lines(head, numbered(names), message('clarify_pick', locale));
}

/**
 * Removes fences and control characters from model output and caps its length.
 * Returns `null` when nothing usable remains.
 */
export function sanitizeGenerated(text: string | null | undefined, maxChars = MAX_REPLY_CHARS): string | null {
  if (!text) return null;
  const cleaned = text
    .replace(/```[a-z]*\n?/gi, '')
    .replace(/[\u0000-\u0008\u000B-\u001F\u007F]/g, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
  if (!cleaned) return null;
  const chars = Array.from(cleaned);
  return chars.length > maxChars ? `${chars.slice(0, maxChars - 1).join('').trimEnd()}…` : cleaned;
}

/** Same decision and snapshot always render the same text; only escalations use generated text. */
export function formatDecision(decision: RoutingDecision, ctx: FormatContext, generated?: string | null): string {
  switch (decision.type) {
    case 'direct':
      return formatDirect(decision.payload, ctx.snapshot, ctx.locale);
    case 'clarify':
      return formatClarify(decision.missingField, decision.prompt, ctx);
    case 'escalate':
      return sanitizeGenerated(generated) ?? message('escalate_fallback', ctx.locale);
  }
}

const CANDIDATE_KIND: Partial<Record<BookingField, ReferenceKind>> = { service: 'service', branch: 'branch' };

function formatAsk(
  effect: Extract<BookingEffect, { type: 'ASK_FIELD' }>,
  session: BookingSession,
  ctx: FormatContext,
): string {
  const { locale, snapshot } = ctx;
  const head =
    effect.reason === 'ambiguous'
      ? message('ambiguous_choice', locale)
      : effect.reason === 'invalid'
        ? message(`invalid_${effect.field}`, locale)
        : message(`ask_${effect.field}`, locale, { name: session.fields.name ?? '' });
  const { doctorId } = session.fields;
  if (effect.field === 'name' && effect.reason === 'first' && doctorId) {
    const doctor = snapshot ? displayName(snapshot, 'doctor', doctorId) : doctorId;
    return `${message('booking_with_doctor', locale, { doctor })}\n\n${head}`;
  }
  const kind = CANDIDATE_KIND[effect.field];
  if (!effect.candidates.length || !kind) return head;
  const names = effect.candidates.map((id) => (snapshot ? displayName(snapshot, kind, id) : id));
  return lines(head, numbered(names));
}

function formatConfirmation(draft: ReservationDraft, reservationId: string, ctx: FormatContext): string {
  const { locale, snapshot } = ctx;
  const none = message('not_specified', locale);
  const summary = lines(
    message('summary_name', locale, { value: draft.name }),
    message('summary_phone', locale, { value: draft.phone }),
    message('summary_service', locale, {
      value: snapshot ? displayName(snapshot, 'service', draft.serviceId) : draft.serviceId,
    }),
    draft.doctorId &&
      message('summary_doctor', locale, {
        value: snapshot ? displayName(snapshot, 'doctor', draft.doctorId) : draft.doctorId,
      }),
    message('summary_branch', locale, {
      value: draft.branchId ? (snapshot ? displayName(snapshot, 'branch', draft.branchId) : draft.branchId) : none,
    }),
    message('summary_when', locale, { value: draft.requestedAt ? formatDate(draft.requestedAt, locale) : none }),
  );
  return `${message('booking_confirmed', locale, { id: reservationId })}\n\n${summary}`;
}

export interface BookingStepView {
  session: BookingSession;
  effects: BookingEffect[];
  reservation?: Reservation;
}

export function formatBookingStep(step: BookingStepView, ctx: FormatContext): string {
  const parts = step.effects.map((effect) => {
    switch (effect.type) {
      case 'ASK_FIELD':
        return formatAsk(effect, step.session, ctx);
      case 'CREATE_RESERVATION':
        return formatConfirmation(
          effect.draft,
          step.reservation?.id ?? step.session.reservationId ?? step.session.id,
          ctx,
        );
      case 'CLOSED':
        return message(
          effect.reason === 'user_cancelled'
            ? 'booking_cancelled'
            : effect.reason === 'timeout'
              ? 'booking_timeout'
              : 'booking_too_many_attempts',
          ctx.locale,
        );
    }
  });
  return parts.filter(Boolean).join('\n\n');
}

export function formatThrottleNotice(locale: Locale): string {
  return message('throttled', locale);
}

export function formatPersistenceFailure(locale: Locale): string {
  return message('persistence_error', locale);
}

export function formatTimeoutNotice(locale: Locale): string {
  return message('booking_timeout', locale);
}
