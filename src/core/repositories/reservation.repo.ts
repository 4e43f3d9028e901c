import crypto from 'crypto';

import { DateTime } from 'luxon';
import type { QueryResult, QueryResultRow } from 'pg';

import type { Reservation, ReservationDraft, ReservationStatus } from '@core/interfaces/booking.types.js';
import { isPlatform } from '@core/interfaces/message.types.js';

import { PersistenceError } from '@core/errors/persistence.error.js';

export type QueryFn = <T extends QueryResultRow>(text: string, params?: unknown[]) => Promise<QueryResult<T>>;

export interface ReservationRepository {
  /** Idempotent per key: a second call with the same key returns the first reservation. */
  create(draft: ReservationDraft, idempotencyKey: string): Promise<Reservation>;
  findByKey(idempotencyKey: string): Promise<Reservation | null>;
}

/**
 * `BD-<yyyyMMddHHmmss>-<first six chars of the user id>-<six hex chars of sha256(idempotencyKey)>`.
 * The digest keeps ids distinct for users with the same number prefix booking in the same second.
 */
export function buildReservationId(userId: string, idempotencyKey: string, at: Date = new Date()): string {
  const stamp = DateTime.fromJSDate(at).toUTC().toFormat('yyyyLLddHHmmss');
  const user = userId.replace(/[^A-Za-z0-9]/g, '').slice(0, 6) || 'anon';
  const digest = crypto.createHash('sha256').update(idempotencyKey).digest('hex').slice(0, 6);
  return `BD-${stamp}-${user}-${digest}`;
}

interface ReservationRow {
  id: string;
  idempotency_key: string;
  platform: string;
  user_id: string;
  name: string;
  phone: string;
  service_id: string;
  doctor_id: string | null;
  branch_id: string | null;
  requested_at: string | null;
  status: string;
  created_at: Date | string;
}

const STATUSES: readonly ReservationStatus[] = ['pending', 'confirmed', 'cancelled'];

function toReservation(row: ReservationRow): Reservation {
  if (!isPlatform(row.platform)) {
    throw new PersistenceError(`Unknown platform on reservation ${row.id}: ${row.platform}`);
  }
  const status = STATUSES.find((s) => s === row.status) ?? 'pending';
  return {
    id: row.id,
    idempotencyKey: row.idempotency_key,
    platform: row.platform,
    userId: row.user_id,
    name: row.name,
    phone: row.phone,
    serviceId: row.service_id,
    doctorId: row.doctor_id,
    branchId: row.branch_id,
    requestedAt: row.requested_at,
    status,
    createdAt: row.created_at instanceof Date ? row.created_at.toISOString() : row.created_at,
  };
}

const INSERT_SQL = `
INSERT INTO reservations
  (id, idempotency_key, platform, user_id, name, phone, service_id, doctor_id, branch_id, requested_at, status)
VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, 'pending')
ON CONFLICT (idempotency_key) DO NOTHING
RETURNING *`;

const SELECT_BY_KEY_SQL = 'SELECT * FROM reservations WHERE idempotency_key = $1';

export class PgReservationRepository implements ReservationRepository {
  constructor(private readonly query: QueryFn) {}

  async create(draft: ReservationDraft, idempotencyKey: string): Promise<Reservation> {
    try {
      const inserted = await this.query<ReservationRow>(INSERT_SQL, [
        buildReservationId(draft.userId, idempotencyKey),
        idempotencyKey,
        draft.platform,
        draft.userId,
        draft.name,
        draft.phone,
        draft.serviceId,
        draft.doctorId,
        draft.branchId,
        draft.requestedAt,
      ]);
      if (inserted.rows[0]) return toReservation(inserted.rows[0]);

      const existing = await this.findByKey(idempotencyKey);
      if (!existing) throw new PersistenceError(`Reservation for ${idempotencyKey} vanished after conflict`);
      return existing;
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError('Could not create reservation', err);
    }
  }

  async findByKey(idempotencyKey: string): Promise<Reservation | null> {
    try {
      const result = await this.query<ReservationRow>(SELECT_BY_KEY_SQL, [idempotencyKey]);
      return result.rows[0] ? toReservation(result.rows[0]) : null;
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError('Could not read reservation', err);
    }
  }
}

export class InMemoryReservationRepository implements ReservationRepository {
  private readonly byKey = new Map<string, Reservation>();

  async create(draft: ReservationDraft, idempotencyKey: string): Promise<Reservation> {
    const existing = this.byKey.get(idempotencyKey);
    if (existing) return existing;
    const reservation: Reservation = {
      ...draft,
      id: buildReservationId(draft.userId, idempotencyKey),
      idempotencyKey,
      status: 'pending',
      createdAt: new Date().toISOString(),
    };
    this.byKey.set(idempotencyKey, Object.freeze(reservation));
    return reservation;
  }

  async findByKey(idempotencyKey: string): Promise<Reservation | null> {
    return this.byKey.get(idempotencyKey) ?? null;
  }

  get count(): number {
    return this.byKey.size;
  }
}
