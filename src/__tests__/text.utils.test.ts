import { describe, expect, it } from 'vitest';

import { containmentScore, fuzzySimilarity, rankCandidates, windowScore } from '@utils/fuzzy.js';
import { findPhoneToken, normalizePhone } from '@utils/phone.js';
import { normalizeText, stripArticle, toLatinDigits, tokenize } from '@utils/text.js';

describe('normalizeText', () => {
  it('folds letter variants and strips diacritics', () => {
    expect(normalizeText('أَحْمَدُ')).toBe('احمد');
    expect(normalizeText('مدرسة')).toBe('مدرسه');
    expect(normalizeText('إلى')).toBe('الي');
  });

  it('maps Arabic-Indic digits and keeps clock times intact', () => {
    expect(toLatinDigits('٠٥٠١٢٣٤٥٦٧')).toBe('0501234567');
    expect(normalizeText('الساعة ٥:٣٠ مساءً؟')).toBe('الساعه 5:30 مساء');
  });

  it('lowercases Latin text and drops punctuation', () => {
    expect(normalizeText('  Hello, Dr. Sara!  ')).toBe('hello dr sara');
  });
});

describe('tokenize', () => {
  it('drops the definite article and its clitics', () => {
    expect(tokenize('بالتنظيف والتبييض')).toEqual(['تنظيف', 'تبييض']);
    expect(stripArticle('الم')).toBe('الم');
  });
});

describe('fuzzy matching', () => {
  it('scores edit distance on a 0..1 scale', () => {
    expect(fuzzySimilarity('kitten', 'sitting')).toBeCloseTo(4 / 7);
    expect(fuzzySimilarity('same', 'same')).toBe(1);
  });

  it('only accepts short names on an exact match', () => {
    expect(windowScore(['ساره'], ['سارا'])).toBe(0);
    expect(windowScore(['ساره'], ['ساره'])).toBe(1);
  });

  it('finds a name inside a longer sentence', () => {
    const matches = rankCandidates(
      'ابي اسعار التنظيف',
      [
        { id: 'clean', names: ['تنظيف الأسنان', 'تنظيف'] },
        { id: 'whiten', names: ['تبييض'] },
      ],
      { threshold: 0.72 },
    );
    expect(matches).toEqual([{ id: 'clean', score: 1 }]);
  });

  it('reports every candidate close to the best one', () => {
    const matches = rankCandidates(
      'احمد',
      [
        { id: 'DR-002', names: ['أحمد القحطاني'] },
        { id: 'DR-001', names: ['أحمد السالم'] },
      ],
      { threshold: 0.4 },
    );
    expect(matches.map((m) => m.id)).toEqual(['DR-001', 'DR-002']);
  });

  it('scores the share of query tokens a name contains', () => {
    expect(containmentScore(['د', 'احمد'], ['د', 'احمد', 'سالم'])).toBe(1);
    expect(containmentScore(['احمد', 'موجود'], ['احمد', 'سالم'])).toBe(0.5);
    expect(containmentScore(['محمد'], ['احمد', 'سالم'])).toBe(0);
  });

  it('treats a first name shared by two candidates as ambiguous', () => {
    const candidates = [
      { id: 'DR-001', names: ['د. أحمد السالم', 'أحمد السالم'] },
      { id: 'DR-002', names: ['د. أحمد القحطاني', 'أحمد القحطاني'] },
      { id: 'DR-003', names: ['د. سارة العتيبي', 'سارة'] },
    ];

    expect(rankCandidates('احمد', candidates, { threshold: 0.72 })).toEqual([]);
    expect(rankCandidates('احمد', candidates, { threshold: 0.72, isolatedName: true })).toEqual([
      { id: 'DR-001', score: 1 },
      { id: 'DR-002', score: 1 },
    ]);
  });
});

describe('phone numbers', () => {
  it('normalizes Saudi mobiles to the local format', () => {
    expect(normalizePhone('+966 50 123 4567')).toBe('0501234567');
    expect(normalizePhone('00966501234567')).toBe('0501234567');
    expect(normalizePhone('٠٥٠١٢٣٤٥٦٧')).toBe('0501234567');
    expect(normalizePhone('501234567')).toBe('0501234567');
  });

  it('rejects numbers that are not Saudi mobiles', () => {
    expect(normalizePhone('0412345678')).toBeNull();
    expect(normalizePhone('12345')).toBeNull();
  });

  it('picks the first phone-shaped run out of a sentence', () => {
    expect(findPhoneToken('رقمي 050 123 4567 شكرا')).toBe('050 123 4567');
    expect(findPhoneToken('ما عندي رقم')).toBeNull();
  });
});
