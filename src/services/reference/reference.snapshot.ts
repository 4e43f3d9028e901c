import type { AvailabilityRow, ReferenceSnapshot } from '@core/interfaces/reference.types.js';

import type { ReferenceData } from './reference.source.js';

export function availabilityKey(date: string, doctorId: string): string {
  return `${date}|${doctorId}`;
}

function indexById<T extends { id: string }>(rows: T[]): ReadonlyMap<string, T> {
  return new Map(rows.map((row) => [row.id, Object.freeze({ ...row })]));
}

/** Builds an immutable snapshot. Later availability rows for the same day and doctor win. */
export function buildSnapshot(data: ReferenceData, version: number, loadedAt = new Date().toISOString()): ReferenceSnapshot {
  const availability = new Map<string, AvailabilityRow>();
  for (const row of data.availability) {
    availability.set(availabilityKey(row.date, row.doctorId), Object.freeze({ ...row }));
  }
  return Object.freeze({
    version,
    loadedAt,
    doctors: indexById(data.doctors),
    branches: indexById(data.branches),
    services: indexById(data.services),
    availability,
  });
}

export function findAvailability(
  snapshot: ReferenceSnapshot,
  date: string,
  doctorId: string,
): AvailabilityRow | undefined {
  return snapshot.availability.get(availabilityKey(date, doctorId));
}
