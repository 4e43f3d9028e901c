import { describe, expect, it } from 'vitest';

import { InMemoryDedupGate } from '../dedup.gate.js';

describe('InMemoryDedupGate', () => {
  it('claims a message id once per platform', async () => {
    const gate = new InMemoryDedupGate(60_000, 100);

    expect(await gate.claim('whatsapp', 'm1')).toBe(true);
    expect(await gate.claim('whatsapp', 'm1')).toBe(false);
    expect(await gate.claim('instagram', 'm1')).toBe(true);
    expect(await gate.seen('whatsapp', 'm1')).toBe(true);
  });

  it('admits exactly one of two concurrent claims for the same id', async () => {
    const gate = new InMemoryDedupGate(60_000, 100);

    const results = await Promise.all([gate.claim('whatsapp', 'm1'), gate.claim('whatsapp', 'm1')]);

    expect(results).toEqual([true, false]);
    expect(gate.size).toBe(1);
  });

  it('forgets an id after its ttl', async () => {
    let now = 1_000;
    const gate = new InMemoryDedupGate(5_000, 100, () => now);

    await gate.markSeen('tiktok', 'm1');
    now += 4_999;
    expect(await gate.seen('tiktok', 'm1')).toBe(true);
    now += 1;
    expect(await gate.seen('tiktok', 'm1')).toBe(false);
    expect(gate.size).toBe(0);
  });

  it('drops the oldest ids beyond the entry bound', async () => {
    const gate = new InMemoryDedupGate(60_000, 2);

    await gate.markSeen('whatsapp', 'a');
    await gate.markSeen('whatsapp', 'b');
    await gate.markSeen('whatsapp', 'c');

    expect(gate.size).toBe(2);
    expect(await gate.seen('whatsapp', 'a')).toBe(false);
    expect(await gate.seen('whatsapp', 'c')).toBe(true);
  });

  it('lets a released id be claimed again', async () => {
    const gate = new InMemoryDedupGate(60_000, 10);

    await gate.claim('whatsapp', 'm1');
    await gate.release('whatsapp', 'm1');

    expect(await gate.claim('whatsapp', 'm1')).toBe(true);
  });
});
