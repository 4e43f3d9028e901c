import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { Intent } from '@core/interfaces/classification.types.js';
import type { ConversationMemory } from '@core/interfaces/conversation.types.js';
import type { LlmClassification } from '@core/interfaces/llm.types.js';

import { fakeLlm } from '@test/fixtures/fake-llm.js';
import { FIXED_NOW, fixtureSnapshot } from '@test/fixtures/reference.fixture.js';

import { ClassifierService } from '../classifier.service.js';

const snapshot = fixtureSnapshot();
const empty: ConversationMemory = { turns: [] };

function modelSays(intent: Intent): LlmClassification {
  return {
    intent,
    confidence: 0.9,
    entities: { doctor: null, service: null, branch: null, date: null, time: null, phone: null, name: null, topic: null },
  };
}

function classifierWith(llm = fakeLlm()) {
  return { llm, classifier: new ClassifierService(llm, { fuzzyThreshold: 0.72, timezone: 'Asia/Riyadh' }) };
}

describe('ClassifierService', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(FIXED_NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('answers a confident keyword match without the model', async () => {
    const { llm, classifier } = classifierWith();

    const result = await classifier.classify({ text: 'كم سعر التنظيف؟', memory: empty, snapshot });

    expect(result.intent).toBe('price_query');
    expect(result.source).toBe('rules');
    expect(result.confidence).toBeGreaterThanOrEqual(0.7);
    expect(result.entities.service?.ids).toEqual(['SV-CLEAN']);
    expect(llm.classify).not.toHaveBeenCalled();
  });

  it('treats working-hours questions about a doctor as availability', async () => {
    const { llm, classifier } = classifierWith();

    const result = await classifier.classify({ text: 'متى دوام د. سارة', memory: empty, snapshot });

    expect(result.intent).toBe('availability_query');
    expect(result.entities.doctor?.ids).toEqual(['DR-003']);
    expect(result.entities.topic?.value).toBe('hours');
    expect(llm.classify).not.toHaveBeenCalled();
  });

  it('keeps a weak rule match even when the model would say otherwise', async () => {
    const llm = fakeLlm();
    llm.classify.mockResolvedValue({ ok: true, value: modelSays('greeting') });
    const { classifier } = classifierWith(llm);

    const result = await classifier.classify({ text: 'د. سارة', memory: empty, snapshot });

    expect(result).toMatchObject({ intent: 'info_query', confidence: 0.6, source: 'rules', warnings: [] });
    expect(result.entities.doctor?.ids).toEqual(['DR-003']);
    expect(llm.classify).not.toHaveBeenCalled();
  });

  it('reports a titled first name shared by two doctors as ambiguous', async () => {
    const { classifier } = classifierWith();

    const result = await classifier.classify({ text: 'هل د. أحمد موجود اليوم؟', memory: empty, snapshot });

    expect(result.intent).toBe('availability_query');
    expect(result.entities.doctor).toEqual({ kind: 'reference', ref: 'doctor', raw: 'احمد', ids: ['DR-001', 'DR-002'] });
  });

  it('lets the model pick between tied rule intents', async () => {
    const llm = fakeLlm();
    llm.classify.mockResolvedValue({ ok: true, value: modelSays('price_query') });
    const { classifier } = classifierWith(llm);

    const result = await classifier.classify({ text: 'price booking', memory: empty, snapshot });

    expect(llm.classify).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ intent: 'price_query', confidence: 0.5, source: 'rules', warnings: [] });
  });

  it('ignores a tie-break answer outside the tied intents', async () => {
    const llm = fakeLlm();
    llm.classify.mockResolvedValue({ ok: true, value: modelSays('greeting') });
    const { classifier } = classifierWith(llm);

    const result = await classifier.classify({ text: 'price booking', memory: empty, snapshot });

    expect(result).toMatchObject({ intent: 'booking_request', source: 'rules', warnings: [] });
  });

  it('keeps the priority intent of a tie when the model output is invalid', async () => {
    const llm = fakeLlm();
    llm.classify.mockResolvedValue({ ok: false, failure: { kind: 'schema_violation', message: 'intent' } });
    const { classifier } = classifierWith(llm);

    const result = await classifier.classify({ text: 'price booking', memory: empty, snapshot });

    expect(result).toMatchObject({
      intent: 'booking_request',
      confidence: 0.5,
      source: 'rules',
      warnings: ['llm_schema_violation'],
    });
  });

  it('falls back to unknown when nothing matched and the model timed out', async () => {
    const llm = fakeLlm();
    llm.classify.mockResolvedValue({ ok: false, failure: { kind: 'timeout', message: 'Deadline of 8000ms exceeded' } });
    const { classifier } = classifierWith(llm);

    const result = await classifier.classify({ text: 'ممكن سؤال', memory: empty, snapshot });

    expect(result).toEqual({
      intent: 'unknown',
      entities: {},
      confidence: 0,
      source: 'fallback',
      warnings: ['llm_timeout'],
    });
  });

  it('grounds the names the model returns against reference data', async () => {
    const llm = fakeLlm();
    llm.classify.mockResolvedValue({
      ok: true,
      value: {
        intent: 'price_query',
        confidence: 0.8,
        entities: {
          doctor: null,
          service: 'تبييض',
          branch: null,
          date: 'بكرة',
          time: '17:00',
          phone: null,
          name: null,
          topic: null,
        },
      },
    });
    const { classifier } = classifierWith(llm);

    const result = await classifier.classify({ text: 'ممكن سؤال', memory: empty, snapshot });

    expect(result.source).toBe('llm');
    expect(result.intent).toBe('price_query');
    expect(result.entities.service).toEqual({ kind: 'reference', ref: 'service', raw: 'تبييض', ids: ['SV-WHITEN'] });
    expect(result.entities.date?.iso).toBe('2026-10-20');
    expect(result.entities.time?.value).toBe('17:00');
    expect(llm.classify.mock.calls[0]?.[1]).toMatchObject({ today: '2026-10-19', timezone: 'Asia/Riyadh' });
  });

  it('reads a numbered reply as the answer to a pending clarification', async () => {
    const { llm, classifier } = classifierWith();
    const memory: ConversationMemory = {
      turns: [],
      pending: {
        intent: 'availability_query',
        entities: {},
        missingField: 'doctor',
        options: ['DR-001', 'DR-002', 'DR-003'],
        askedAt: FIXED_NOW.toISOString(),
      },
    };

    const result = await classifier.classify({ text: '٢', memory, snapshot });

    expect(result.intent).toBe('clarification_answer');
    expect(result.entities.doctor?.ids).toEqual(['DR-002']);
    expect(llm.classify).not.toHaveBeenCalled();
  });

  it('returns frozen results', async () => {
    const { classifier } = classifierWith();

    const result = await classifier.classify({ text: 'هلا', memory: empty, snapshot });

    expect(result.intent).toBe('greeting');
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.entities)).toBe(true);
  });
});
