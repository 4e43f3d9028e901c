import type { DateTime } from 'luxon';

import type { ReferenceSnapshot } from '@core/interfaces/reference.types.js';

import { groundReference } from '@services/ai/entity.extractor.js';

import { parseDate, parseTime } from '@utils/date.parser.js';
import { findPhoneToken, normalizePhone } from '@utils/phone.js';
import { normalizeText, toLatinDigits } from '@utils/text.js';

export type FieldResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'skipped' }
  | { status: 'ambiguous'; candidates: string[] }
  | { status: 'invalid' };

const NAME_MIN = 2;
const NAME_MAX = 60;
const NAME_PREFIX = /^(?:اسمي|انا|أنا|my name is|i am|i'm)\s+/i;

const SKIP_WORDS = new Set(['تخطي', 'skip', 'لا', 'no', 'بدون', 'مو مهم', 'ما يهم', 'any', 'اي شي', 'anything'].map(normalizeText));

export function isSkip(text: string): boolean {
  return SKIP_WORDS.has(normalizeText(text));
}

/** Index into the last offered list when the user answers with a number. */
function pickChoice(text: string, candidates: string[] | undefined): string | undefined {
  if (!candidates?.length) return undefined;
  const m = /^\s*(\d{1,2})\s*$/.exec(toLatinDigits(text));
  return m ? candidates[Number(m[1]) - 1] : undefined;
}

export function validateName(text: string): FieldResult<string> {
  const name = text.trim().replace(NAME_PREFIX, '').replace(/\s+/g, ' ').trim();
  if (name.length < NAME_MIN || name.length > NAME_MAX) return { status: 'invalid' };
  if (!/\p{L}/u.test(name) || /\d/.test(toLatinDigits(name))) return { status: 'invalid' };
  return { status: 'ok', value: name };
}

export function validatePhone(text: string): FieldResult<string> {
  const token = findPhoneToken(text) ?? text;
  const phone = normalizePhone(token);
  return phone ? { status: 'ok', value: phone } : { status: 'invalid' };
}

export function validateService(
  text: string,
  snapshot: ReferenceSnapshot,
  threshold: number,
  offered?: string[],
): FieldResult<string> {
  const chosen = pickChoice(text, offered);
  if (chosen) return { status: 'ok', value: chosen };
  const { ids } = groundReference(text, 'service', snapshot, threshold);
  if (ids.length === 1) return { status: 'ok', value: ids[0] };
  if (ids.length > 1) return { status: 'ambiguous', candidates: ids };
  return { status: 'invalid' };
}

/** Branch answer; restricted to branches offering the chosen service when it lists any. */
export function validateBranch(
  text: string,
  snapshot: ReferenceSnapshot,
  threshold: number,
  serviceId: string | undefined,
  offered?: string[],
): FieldResult<string> {
  if (isSkip(text)) return { status: 'skipped' };
  const chosen = pickChoice(text, offered ?? branchOptions(snapshot, serviceId));
  if (chosen) return { status: 'ok', value: chosen };
  const allowed = new Set(branchOptions(snapshot, serviceId));
  const ids = groundReference(text, 'branch', snapshot, threshold).ids.filter((id) => allowed.has(id));
  if (ids.length === 1) return { status: 'ok', value: ids[0] };
  if (ids.length > 1) return { status: 'ambiguous', candidates: ids };
  return { status: 'invalid' };
}

export function branchOptions(snapshot: ReferenceSnapshot, serviceId: string | undefined): string[] {
  const service = serviceId ? snapshot.services.get(serviceId) : undefined;
  const listed = service?.branchIds.filter((id) => snapshot.branches.has(id)) ?? [];
  return listed.length ? listed : Array.from(snapshot.branches.keys());
}

/** True when the date part of `YYYY-MM-DD[ HH:mm]` is today or later. */
export function isNotPast(dateTime: string, today: DateTime): boolean {
  return dateTime.slice(0, 10) >= (today.toISODate() ?? '');
}

/** `YYYY-MM-DD` or `YYYY-MM-DD HH:mm`; a bare time means today. Past dates are rejected. */
export function validateDateTime(text: string, today: DateTime): FieldResult<string> {
  if (isSkip(text)) return { status: 'skipped' };
  const date = parseDate(text, today);
  const time = parseTime(text);
  if (!date && !time) return { status: 'invalid' };
  const iso = date?.iso ?? today.toISODate() ?? '';
  if (!isNotPast(iso, today)) return { status: 'invalid' };
  return { status: 'ok', value: time ? `${iso} ${time.hhmm}` : iso };
}
