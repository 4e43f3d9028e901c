import type { QueryResult, QueryResultRow } from 'pg';
import { describe, expect, it, vi } from 'vitest';

import { PersistenceError } from '@core/errors/index.js';
import type { ReservationDraft } from '@core/interfaces/booking.types.js';

import { InMemoryReservationRepository, PgReservationRepository, buildReservationId, type QueryFn } from '../reservation.repo.js';

const draft: ReservationDraft = {
  platform: 'whatsapp',
  userId: '966500000001',
  name: 'محمد',
  phone: '0501234567',
  serviceId: 'SV-CLEAN',
  doctorId: 'DR-003',
  branchId: 'BR-OLAYA',
  requestedAt: '2026-10-20 17:00',
};

const storedRow = {
  id: 'BD-20261019090000-966500',
  idempotency_key: 'bk-1',
  platform: 'whatsapp',
  user_id: '966500000001',
  name: 'محمد',
  phone: '0501234567',
  service_id: 'SV-CLEAN',
  doctor_id: 'DR-003',
  branch_id: 'BR-OLAYA',
  requested_at: '2026-10-20 17:00',
  status: 'pending',
  created_at: new Date('2026-10-19T09:00:00.000Z'),
};

function result<T extends QueryResultRow>(rows: T[]): QueryResult<T> {
  return { rows, rowCount: rows.length, command: 'SELECT', oid: 0, fields: [] };
}

/** Answers each call with the next queued row set. */
function fakeQuery(...responses: QueryResultRow[][]) {
  const calls: Array<{ text: string; params?: unknown[] }> = [];
  const query: QueryFn = async <T extends QueryResultRow>(text: string, params?: unknown[]) => {
    calls.push({ text, params });
    const rows = responses.shift() ?? [];
    return result(rows.filter((row): row is T => typeof row === 'object'));
  };
  return { query, calls };
}

describe('buildReservationId', () => {
  it('combines a UTC timestamp, the start of the user id and a digest of the key', () => {
    const at = new Date('2026-10-19T09:00:00.000Z');

    expect(buildReservationId('+966-500-000001', 'bk-1', at)).toBe('BD-20261019090000-966500-40d9b1');
    expect(buildReservationId('***', 'bk-2', at)).toBe('BD-20261019090000-anon-e0af74');
  });

  it('keeps ids apart for users with the same prefix in the same second', () => {
    const at = new Date('2026-10-19T05:10:40.000Z');

    expect(buildReservationId('966501112233', 'session-a', at)).toBe('BD-20261019051040-966501-fa57a5');
    expect(buildReservationId('966501998877', 'session-b', at)).toBe('BD-20261019051040-966501-e8de01');
  });
});

describe('PgReservationRepository', () => {
  it('inserts a reservation keyed by the session id', async () => {
    const { query, calls } = fakeQuery([storedRow]);

    const reservation = await new PgReservationRepository(query).create(draft, 'bk-1');

    expect(reservation).toEqual({
      id: 'BD-20261019090000-966500',
      idempotencyKey: 'bk-1',
      platform: 'whatsapp',
      userId: '966500000001',
      name: 'محمد',
      phone: '0501234567',
      serviceId: 'SV-CLEAN',
      doctorId: 'DR-003',
      branchId: 'BR-OLAYA',
      requestedAt: '2026-10-20 17:00',
      status: 'pending',
      createdAt: '2026-10-19T09:00:00.000Z',
    });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.text).toContain('ON CONFLICT (idempotency_key) DO NOTHING');
    expect(calls[0]?.params?.[0]).toMatch(/^BD-\d{14}-966500-40d9b1$/);
    expect(calls[0]?.params?.slice(1)).toEqual([
      'bk-1',
      'whatsapp',
      '966500000001',
      'محمد',
      '0501234567',
      'SV-CLEAN',
      'DR-003',
      'BR-OLAYA',
      '2026-10-20 17:00',
    ]);
  });

  it('returns the existing reservation when the key was already used', async () => {
    const { query, calls } = fakeQuery([], [storedRow]);

    const reservation = await new PgReservationRepository(query).create(draft, 'bk-1');

    expect(reservation.id).toBe('BD-20261019090000-966500');
    expect(calls).toHaveLength(2);
    expect(calls[1]?.params).toEqual(['bk-1']);
  });

  it('wraps driver errors', async () => {
    const query: QueryFn = vi.fn(async () => {
      throw new Error('connection refused');
    });

    await expect(new PgReservationRepository(query).create(draft, 'bk-1')).rejects.toBeInstanceOf(PersistenceError);
  });

  it('refuses rows with an unknown platform', async () => {
    const { query } = fakeQuery([{ ...storedRow, platform: 'fax' }]);

    await expect(new PgReservationRepository(query).findByKey('bk-1')).rejects.toThrow('Unknown platform');
  });
});

describe('InMemoryReservationRepository', () => {
  it('is idempotent per key', async () => {
    const repo = new InMemoryReservationRepository();

    const first = await repo.create(draft, 'bk-1');
    const second = await repo.create({ ...draft, name: 'someone else' }, 'bk-1');

    expect(second).toBe(first);
    expect(repo.count).toBe(1);
    expect(await repo.findByKey('bk-2')).toBeNull();
  });

  it('gives different sessions of look-alike users different ids', async () => {
    const repo = new InMemoryReservationRepository();

    const a = await repo.create({ ...draft, userId: '966501112233' }, 'session-a');
    const b = await repo.create({ ...draft, userId: '966501998877' }, 'session-b');

    expect(a.id).toMatch(/^BD-\d{14}-966501-fa57a5$/);
    expect(b.id).toMatch(/^BD-\d{14}-966501-e8de01$/);
    expect(repo.count).toBe(2);
  });
});
