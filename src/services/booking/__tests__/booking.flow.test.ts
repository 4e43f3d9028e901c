import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { BookingSession } from '@core/interfaces/booking.types.js';
import { InMemoryReservationRepository } from '@core/repositories/reservation.repo.js';

import { InMemorySessionStore } from '@services/conversation/session.store.js';

import { FIXED_NOW, fixtureSnapshot } from '@test/fixtures/reference.fixture.js';

import { BookingFlowService, type BookingStepResult } from '../booking.flow.js';
import { BookingMachine } from '../booking.machine.js';

const snapshot = fixtureSnapshot();

function setup() {
  const sessions = new InMemorySessionStore();
  const reservations = new InMemoryReservationRepository();
  const flow = new BookingFlowService(
    sessions,
    reservations,
    { fuzzyThreshold: 0.72, maxFieldAttempts: 3, timeoutMinutes: 30, timezone: 'Asia/Riyadh' },
    new BookingMachine(),
    () => 'bk-1',
  );
  return { sessions, reservations, flow };
}

async function answer(flow: BookingFlowService, previous: BookingStepResult, text: string) {
  return flow.step({ action: 'continue', session: previous.session, text }, snapshot);
}

describe('BookingFlowService', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(FIXED_NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('creates exactly one reservation when the last field is answered', async () => {
    const { flow, reservations, sessions } = setup();

    let step = await flow.step(
      { action: 'start', platform: 'whatsapp', userId: '966500000001', prefill: { serviceId: 'SV-CLEAN' }, previous: null },
      snapshot,
    );
    expect(step.session.version).toBe(1);

    step = await answer(flow, step, 'محمد');
    step = await answer(flow, step, '0501234567');
    step = await answer(flow, step, 'العليا');
    step = await answer(flow, step, 'تخطي');

    expect(step.session.state).toBe('done');
    expect(step.session.closedReason).toBe('completed');
    expect(step.reservation).toMatchObject({
      id: 'BD-20261019090000-966500-40d9b1',
      idempotencyKey: 'bk-1',
      serviceId: 'SV-CLEAN',
      branchId: 'BR-OLAYA',
      requestedAt: null,
      status: 'pending',
    });
    expect(step.session.reservationId).toBe('BD-20261019090000-966500-40d9b1');
    expect(reservations.count).toBe(1);
    expect((await sessions.get('whatsapp', '966500000001'))?.state).toBe('done');

    const again = await answer(flow, step, 'تخطي');
    expect(again.effects).toEqual([]);
    expect(reservations.count).toBe(1);
  });

  it('leaves the stored session untouched when saving fails', async () => {
    const { flow, sessions } = setup();
    const started = await flow.step(
      { action: 'start', platform: 'instagram', userId: 'ig-1', prefill: {}, previous: null },
      snapshot,
    );
    vi.spyOn(sessions, 'save').mockRejectedValueOnce(new Error('store unavailable'));

    const result = await answer(flow, started, 'محمد');

    expect(result.failure).toBe('persistence');
    expect(result.effects).toEqual([]);
    expect(result.session).toEqual(started.session);
    expect((await sessions.get('instagram', 'ig-1'))?.state).toBe('name');
  });

  it('reports a conflicting concurrent write as a persistence failure', async () => {
    const { flow } = setup();
    const started = await flow.step(
      { action: 'start', platform: 'instagram', userId: 'ig-2', prefill: {}, previous: null },
      snapshot,
    );
    await answer(flow, started, 'محمد');

    const stale = await answer(flow, started, 'سارة');

    expect(stale.failure).toBe('persistence');
  });

  it('expires an idle open session and ignores a fresh one', async () => {
    const { flow, sessions } = setup();
    const idle: BookingSession = {
      id: 'bk-idle',
      platform: 'tiktok',
      userId: 'tt-1',
      state: 'phone',
      fields: { name: 'محمد' },
      attempts: 0,
      version: 0,
      createdAt: '2026-10-19T08:00:00.000Z',
      updatedAt: '2026-10-19T08:00:00.000Z',
    };
    const stored = await sessions.save(idle);

    expect(await flow.expireIfStale({ ...stored, updatedAt: '2026-10-19T08:50:00.000Z' })).toBeNull();

    const expired = await flow.expireIfStale(stored);
    expect(expired?.session.state).toBe('cancelled');
    expect(expired?.session.closedReason).toBe('timeout');
    expect(expired?.effects).toEqual([{ type: 'CLOSED', reason: 'timeout' }]);
    expect(await flow.expireIfStale(null)).toBeNull();
  });
});
