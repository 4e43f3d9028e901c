import { DateTime } from 'luxon';

import { normalizeText } from './text.js';

export interface ParsedDate {
  iso: string;
  raw: string;
}

export interface ParsedTime {
  hhmm: string;
  raw: string;
}

/** luxon weekday numbers, Monday = 1. Keys are normalized. */
const WEEKDAYS: Record<string, number> = {
  الاثنين: 1,
  الاتنين: 1,
  monday: 1,
  الثلاثاء: 2,
  الثلاثا: 2,
  tuesday: 2,
  الاربعاء: 3,
  الاربعا: 3,
  wednesday: 3,
  الخميس: 4,
  thursday: 4,
  الجمعه: 5,
  friday: 5,
  السبت: 6,
  saturday: 6,
  الاحد: 7,
  sunday: 7,
};

const RELATIVE: Array<[RegExp, number]> = [
  [/بعد (?:بكره|بكرا|غدا|باكر)|day after tomorrow/, 2],
  [/بكره|بكرا|غدا|باكر|tomorrow/, 1],
  [/اليوم|today/, 0],
];

const ISO_DATE = /\b(\d{4})-(\d{1,2})-(\d{1,2})\b/;
const DMY_DATE = /\b(\d{1,2})[/-](\d{1,2})[/-](\d{4})\b/;

/** Resolves a date mention relative to `today` (clinic time zone). Weekdays mean the next occurrence. */
export function parseDate(text: string, today: DateTime): ParsedDate | null {
  const norm = normalizeText(text);

  const iso = ISO_DATE.exec(norm);
  if (iso) {
    const dt = DateTime.fromObject(
      { year: Number(iso[1]), month: Number(iso[2]), day: Number(iso[3]) },
      { zone: today.zone },
    );
    if (dt.isValid) return { iso: dt.toISODate() ?? iso[0], raw: iso[0] };
  }

  const dmy = DMY_DATE.exec(norm);
  if (dmy) {
    const dt = DateTime.fromObject(
      { year: Number(dmy[3]), month: Number(dmy[2]), day: Number(dmy[1]) },
      { zone: today.zone },
    );
    if (dt.isValid) return { iso: dt.toISODate() ?? dmy[0], raw: dmy[0] };
  }

  for (const [pattern, offset] of RELATIVE) {
    const m = pattern.exec(norm);
    if (m) {
      return { iso: today.startOf('day').plus({ days: offset }).toISODate() ?? '', raw: m[0] };
    }
  }

  for (const token of norm.split(' ')) {
    const weekday = WEEKDAYS[token] ?? WEEKDAYS[`ال${token}`];
    if (weekday === undefined) continue;
    let ahead = weekday - today.weekday;
    if (ahead <= 0) ahead += 7;
    return { iso: today.startOf('day').plus({ days: ahead }).toISODate() ?? '', raw: token };
  }

  return null;
}

const CLOCK = /\b(\d{1,2}):(\d{2})\s*(am|pm|ص|م)?(?=\s|$)/;
const HOUR_WITH_MERIDIEM = /\b(\d{1,2})\s*(am|pm|ص|م|صباحا|مساء|العصر|بالليل|الصبح)(?=\s|$)/;
const HOUR_AFTER_WORD = /(?:الساعه|at)\s*(\d{1,2})\b/;

const AFTERNOON_MARKERS = new Set(['pm', 'م', 'مساء', 'العصر', 'بالليل']);

function toHHMM(hour: number, minute: number, marker: string | undefined): string | null {
  let h = hour;
  if (marker && AFTERNOON_MARKERS.has(marker) && h < 12) h += 12;
  if (marker && (marker === 'am' || marker === 'ص' || marker === 'صباحا' || marker === 'الصبح') && h === 12) h = 0;
  if (h > 23 || minute > 59) return null;
  return `${String(h).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

export function parseTime(text: string): ParsedTime | null {
  const norm = normalizeText(text);
  const clock = CLOCK.exec(norm);
  if (clock) {
    const hhmm = toHHMM(Number(clock[1]), Number(clock[2]), clock[3]);
    if (hhmm) return { hhmm, raw: clock[0].trim() };
  }
  const meridiem = HOUR_WITH_MERIDIEM.exec(norm);
  if (meridiem) {
    const hhmm = toHHMM(Number(meridiem[1]), 0, meridiem[2]);
    if (hhmm) return { hhmm, raw: meridiem[0] };
  }
  const word = HOUR_AFTER_WORD.exec(norm);
  if (word) {
    const hhmm = toHHMM(Number(word[1]), 0, undefined);
    if (hhmm) return { hhmm, raw: word[0] };
  }
  return null;
}
