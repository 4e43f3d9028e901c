import { DateTime } from 'luxon';

import { config } from '@config/env.config.js';

export function clinicNow(tz: string = config.TIMEZONE): DateTime {
  return DateTime.now().setZone(tz);
}

export function todayISO(tz: string = config.TIMEZONE): string {
  return clinicNow(tz).toISODate() ?? new Date().toISOString().slice(0, 10);
}

export function nowISO(): string {
  return new Date().toISOString();
}

export function minutesSince(iso: string, now: DateTime = DateTime.now()): number {
  const then = DateTime.fromISO(iso);
  if (!then.isValid) return Number.POSITIVE_INFINITY;
  return now.diff(then, 'minutes').minutes;
}
