import { describe, expect, it } from 'vitest';

import type { BookingSession } from '@core/interfaces/booking.types.js';
import type { RoutingDecision } from '@core/interfaces/routing.types.js';

import { fixtureSnapshot } from '@test/fixtures/reference.fixture.js';

import { formatBookingStep, formatDate, formatDecision, sanitizeGenerated } from '../formatter.js';
import { detectLocale, message } from '../templates.js';

const snapshot = fixtureSnapshot();
const ar = { snapshot, locale: 'ar' as const };
const en = { snapshot, locale: 'en' as const };

function direct(payload: Extract<RoutingDecision, { type: 'direct' }>['payload']): RoutingDecision {
  return { type: 'direct', payload };
}

const session: BookingSession = {
  id: 'bk-1',
  platform: 'whatsapp',
  userId: '966500000001',
  state: 'branch',
  fields: { name: 'محمد', phone: '0501234567', serviceId: 'SV-CLEAN' },
  attempts: 0,
  version: 3,
  createdAt: '2026-10-19T09:00:00.000Z',
  updatedAt: '2026-10-19T09:00:00.000Z',
};

describe('formatDecision', () => {
  it('renders availability with the day note', () => {
    const decision = direct({ kind: 'availability', doctorId: 'DR-001', date: '2026-10-19', available: true, note: 'متواجد من 4 العصر' });

    expect(formatDecision(decision, ar)).toBe('✅ د. أحمد السالم متواجد يوم الاثنين 2026-10-19.\nملاحظة: متواجد من 4 العصر');
  });

  it('renders the usual schedule when the day is unknown', () => {
    const decision = direct({ kind: 'schedule', doctorId: 'DR-003', date: '2026-10-20' });

    expect(formatDecision(decision, en)).toBe(
      "I don't have an update on د. سارة العتيبي for Tuesday 2026-10-20.\nUsual schedule: السبت - الأربعاء, 09:00-15:00 at فرع العليا.",
    );
  });

  it('renders prices, ranges and branch restrictions', () => {
    expect(formatDecision(direct({ kind: 'price', serviceId: 'SV-CLEAN' }), ar)).toBe('💰 سعر تنظيف الأسنان: 250 ريال.');
    expect(formatDecision(direct({ kind: 'price', serviceId: 'SV-BRACES' }), ar)).toBe(
      '💰 سعر تقويم الأسنان: 6000 - 15000 ريال حسب الحالة.',
    );
    expect(formatDecision(direct({ kind: 'price', serviceId: 'SV-WHITEN', branchId: 'BR-NARJIS' }), en)).toBe(
      '💰 تبييض الأسنان: 1200 SAR.\n⚠️ This service is not offered at فرع النرجس.',
    );
  });

  it('lists branches with their addresses', () => {
    expect(formatDecision(direct({ kind: 'listing', topic: 'branches' }), ar)).toBe(
      '📍 فروعنا:\n1. فرع العليا: طريق العليا، الرياض\n2. فرع النرجس: حي النرجس، الرياض',
    );
  });

  it('numbers the options of a clarification', () => {
    const decision: RoutingDecision = {
      type: 'clarify',
      missingField: 'doctor',
      prompt: { reason: 'ambiguous', raw: 'احمد', options: ['DR-001', 'DR-002'] },
    };

    expect(formatDecision(decision, ar)).toBe(
      'لقيت أكثر من خيار لـ "احمد"، أيهم تقصد؟\n1. د. أحمد السالم\n2. د. أحمد القحطاني\nاكتب الرقم أو الاسم.',
    );
  });

  it('is deterministic for the same decision and snapshot', () => {
    const decision = direct({ kind: 'listing', topic: 'hours' });

    expect(formatDecision(decision, ar)).toBe(formatDecision(decision, { snapshot: fixtureSnapshot(), locale: 'ar' }));
  });

  it('uses cleaned generated text for escalations and the fixed reply otherwise', () => {
    const decision: RoutingDecision = {
      type: 'escalate',
      context: { reason: 'low_confidence', text: 'hmm', intent: 'info_query', unresolved: [] },
    };

    expect(formatDecision(decision, en, '```\nHello\n\n\n\nthere\u0007```')).toBe('Hello\n\nthere');
    expect(formatDecision(decision, en, '   ')).toBe(message('escalate_fallback', 'en'));
    expect(formatDecision(decision, en, null)).toBe(message('escalate_fallback', 'en'));
  });

  it('falls back when reference data is missing', () => {
    expect(formatDecision(direct({ kind: 'price', serviceId: 'SV-CLEAN' }), { snapshot: null, locale: 'ar' })).toBe(
      message('escalate_fallback', 'ar'),
    );
    expect(formatDecision(direct({ kind: 'greeting' }), { snapshot: null, locale: 'ar' })).toBe(message('greeting', 'ar'));
  });
});

describe('sanitizeGenerated', () => {
  it('caps long output with an ellipsis', () => {
    expect(sanitizeGenerated('a'.repeat(20), 10)).toBe('aaaaaaaaa…');
  });

  it('counts and cuts by code point so emoji stay whole', () => {
    expect(sanitizeGenerated('😀😀😀😀', 4)).toBe('😀😀😀😀');
    expect(sanitizeGenerated('ab😀😀😀', 4)).toBe('ab😀…');
  });

  it('returns null for empty output', () => {
    expect(sanitizeGenerated('```\n```')).toBeNull();
    expect(sanitizeGenerated(undefined)).toBeNull();
  });
});

describe('formatBookingStep', () => {
  it('asks for the next field with numbered candidates', () => {
    const text = formatBookingStep(
      {
        session,
        effects: [{ type: 'ASK_FIELD', field: 'branch', reason: 'first', candidates: ['BR-OLAYA', 'BR-NARJIS'] }],
      },
      ar,
    );

    expect(text).toBe("أي فرع تفضل؟ (أو اكتب 'تخطى' للتخطي)\n1. فرع العليا\n2. فرع النرجس");
  });

  it('greets the user by name when asking for the phone', () => {
    const text = formatBookingStep(
      { session, effects: [{ type: 'ASK_FIELD', field: 'phone', reason: 'first', candidates: [] }] },
      ar,
    );

    expect(text).toBe('مرحباً محمد! ما رقم جوالك؟');
  });

  it('acknowledges the requested doctor before asking for the name', () => {
    const text = formatBookingStep(
      {
        session: { ...session, state: 'name', fields: { doctorId: 'DR-003' } },
        effects: [{ type: 'ASK_FIELD', field: 'name', reason: 'first', candidates: [] }],
      },
      ar,
    );

    expect(text).toBe('✅ حجز عند د. سارة العتيبي\n\nما اسمك؟');
  });

  it('names the doctor in the summary when one was requested', () => {
    const text = formatBookingStep(
      {
        session: { ...session, state: 'done', reservationId: 'BD-1' },
        effects: [
          {
            type: 'CREATE_RESERVATION',
            draft: {
              platform: 'whatsapp',
              userId: '966500000001',
              name: 'Sara',
              phone: '0501234567',
              serviceId: 'SV-CLEAN',
              doctorId: 'DR-003',
              branchId: 'BR-OLAYA',
              requestedAt: null,
            },
          },
        ],
      },
      en,
    );

    expect(text).toBe(
      [
        '✅ We received your request and will get back to you to confirm the appointment\nRequest ID: BD-1',
        '',
        'Name: Sara',
        'Mobile: 0501234567',
        'Service: تنظيف الأسنان',
        'Doctor: د. سارة العتيبي',
        'Branch: فرع العليا',
        'When: not specified',
      ].join('\n'),
    );
  });

  it('confirms a reservation with a summary', () => {
    const text = formatBookingStep(
      {
        session: { ...session, state: 'done', reservationId: 'BD-20261019090000-966500-40d9b1' },
        effects: [
          {
            type: 'CREATE_RESERVATION',
            draft: {
              platform: 'whatsapp',
              userId: '966500000001',
              name: 'محمد',
              phone: '0501234567',
              serviceId: 'SV-CLEAN',
              doctorId: null,
              branchId: null,
              requestedAt: '2026-10-20 17:00',
            },
          },
        ],
      },
      ar,
    );

    expect(text).toBe(
      [
        '✅ تم استلام طلبك وبنرجع لك نأكد الموعد\nرقم الطلب: BD-20261019090000-966500-40d9b1',
        '',
        'الاسم: محمد',
        'الجوال: 0501234567',
        'الخدمة: تنظيف الأسنان',
        'الفرع: غير محدد',
        'الموعد: الثلاثاء 2026-10-20 17:00',
      ].join('\n'),
    );
  });
});

describe('templates', () => {
  it('formats dates with the weekday name', () => {
    expect(formatDate('2026-10-19', 'en')).toBe('Monday 2026-10-19');
    expect(formatDate('soon', 'ar')).toBe('soon');
  });

  it('detects the reply locale from the script', () => {
    expect(detectLocale('كم السعر', 'en')).toBe('ar');
    expect(detectLocale('how much', 'ar')).toBe('en');
    expect(detectLocale('0501234567', 'ar')).toBe('ar');
  });
});
