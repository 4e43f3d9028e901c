import type { DateTime } from 'luxon';

import type {
  ClassificationEntities,
  ReferenceEntity,
  ReferenceKind,
} from '@core/interfaces/classification.types.js';
import type { Branch, Doctor, ReferenceSnapshot, Service } from '@core/interfaces/reference.types.js';

import { parseDate, parseTime } from '@utils/date.parser.js';
import { rankCandidates, tokensMatch, type FuzzyCandidate } from '@utils/fuzzy.js';
import { findPhoneToken, normalizePhone } from '@utils/phone.js';
import { normalizeText, stripArticle, tokenize } from '@utils/text.js';

export interface ExtractOptions {
  threshold: number;
  today: DateTime;
}

const DOCTOR_TITLE = /(?:^|\s)(?:د|دكتور|دكتوره|الدكتور|الدكتوره|dr|doctor)\.?\s+(\S+(?:\s+\S+)?)/;
const BRANCH_MARKER = /(?:^|\s)(?:فرع|بفرع|branch)\s+(\S+(?:\s+\S+)?)/;

export function referenceCandidates(snapshot: ReferenceSnapshot, kind: ReferenceKind): FuzzyCandidate[] {
  const rows: Iterable<Doctor | Service | Branch> =
    kind === 'doctor'
      ? snapshot.doctors.values()
      : kind === 'service'
        ? snapshot.services.values()
        : snapshot.branches.values();
  return Array.from(rows, (row) => ({ id: row.id, names: [row.name, ...row.aliases] }));
}

export function displayName(snapshot: ReferenceSnapshot, kind: ReferenceKind, id: string): string {
  const row =
    kind === 'doctor'
      ? snapshot.doctors.get(id)
      : kind === 'service'
        ? snapshot.services.get(id)
        : snapshot.branches.get(id);
  return row?.name ?? id;
}

/** Grounds a name the caller already isolated (LLM output, a booking answer). */
export function groundReference(
  raw: string,
  kind: ReferenceKind,
  snapshot: ReferenceSnapshot,
  threshold: number,
): ReferenceEntity {
  const ids = rankCandidates(raw, referenceCandidates(snapshot, kind), { threshold, isolatedName: true }).map((m) => m.id);
  return { kind: 'reference', ref: kind, raw: raw.trim(), ids };
}

/**
 * Cuts a marker capture ("احمد موجود") back to the tokens that belong to some
 * candidate name. The first token always stays.
 */
export function trimToName(captured: string, candidates: FuzzyCandidate[]): string {
  const words = captured.split(' ').filter(Boolean);
  const nameTokens = candidates.flatMap((c) => c.names.flatMap((n) => tokenize(n)));
  let keep = words.length;
  while (keep > 1 && !nameTokens.some((n) => tokensMatch(stripArticle(words[keep - 1]), n))) keep -= 1;
  return words.slice(0, keep).join(' ');
}

/**
 * Finds a reference mention anywhere in free text. An explicit marker
 * ("د. X", "فرع X") isolates the name and yields an entity even when nothing matches.
 */
function scanReference(
  text: string,
  kind: ReferenceKind,
  snapshot: ReferenceSnapshot,
  threshold: number,
  marker?: RegExp,
): ReferenceEntity | undefined {
  const candidates = referenceCandidates(snapshot, kind);
  const captured = marker?.exec(normalizeText(text))?.[1];
  const named = captured ? trimToName(captured, candidates) : undefined;

  let matches = named ? rankCandidates(named, candidates, { threshold, isolatedName: true }) : [];
  if (!matches.length) matches = rankCandidates(text, candidates, { threshold });
  if (matches.length) {
    const raw = named ?? (matches.length === 1 ? displayName(snapshot, kind, matches[0].id) : text.trim());
    return { kind: 'reference', ref: kind, raw, ids: matches.map((m) => m.id) };
  }
  if (named) return { kind: 'reference', ref: kind, raw: named, ids: [] };
  return undefined;
}

export function extractEntities(
  text: string,
  snapshot: ReferenceSnapshot | null,
  options: ExtractOptions,
): ClassificationEntities {
  const entities: ClassificationEntities = {};

  if (snapshot) {
    const doctor = scanReference(text, 'doctor', snapshot, options.threshold, DOCTOR_TITLE);
    if (doctor) entities.doctor = doctor;
    const service = scanReference(text, 'service', snapshot, options.threshold);
    if (service) entities.service = service;
    const branch = scanReference(text, 'branch', snapshot, options.threshold, BRANCH_MARKER);
    if (branch) entities.branch = branch;
  }

  const date = parseDate(text, options.today);
  if (date) entities.date = { kind: 'date', iso: date.iso, raw: date.raw };

  const time = parseTime(text);
  if (time) entities.time = { kind: 'text', value: time.hhmm };

  const phoneToken = findPhoneToken(text);
  const phone = phoneToken ? normalizePhone(phoneToken) : null;
  if (phone) entities.phone = { kind: 'text', value: phone };

  return entities;
}
