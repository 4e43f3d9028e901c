import { describe, expect, it } from 'vitest';

import { ReferenceDataUnavailableError } from '@core/errors/index.js';

import { StaticReferenceSource, referenceData, referenceDocument } from '@test/fixtures/reference.fixture.js';

import { ReferenceProvider } from '../reference.provider.js';
import { FileReferenceSource, parseReferenceData, type ReferenceData } from '../reference.source.js';

describe('parseReferenceData', () => {
  it('coerces loosely typed sheet values', () => {
    const data = referenceData();
    const whitening = data.services.find((s) => s.id === 'SV-WHITEN');

    expect(whitening?.priceSar).toBe(1200);
    expect(whitening?.branchIds).toEqual(['BR-OLAYA']);
    expect(data.services.find((s) => s.id === 'SV-BRACES')?.priceSar).toBeNull();
    expect(data.availability.map((a) => a.available)).toEqual([true, false]);
  });

  it('rejects a document without the required tables', () => {
    expect(() => parseReferenceData({ doctors: referenceDocument.doctors })).toThrow(ReferenceDataUnavailableError);
  });
});

describe('FileReferenceSource', () => {
  it('loads the bundled reference file', async () => {
    const data = await new FileReferenceSource('data/reference.json').load();

    expect(data.branches.map((b) => b.id)).toEqual(['BR-OLAYA', 'BR-NARJIS', 'BR-SHATI']);
  });

  it('reports a missing file as unavailable reference data', async () => {
    await expect(new FileReferenceSource('data/missing.json').load()).rejects.toBeInstanceOf(
      ReferenceDataUnavailableError,
    );
  });
});

describe('ReferenceProvider', () => {
  it('loads lazily and bumps the version on refresh', async () => {
    const source = new StaticReferenceSource();
    const provider = new ReferenceProvider(source);

    expect(provider.peek()).toBeNull();
    const first = await provider.current();
    expect(first.version).toBe(1);
    expect(await provider.current()).toBe(first);

    const second = await provider.refresh();
    expect(second.version).toBe(2);
    expect(source.loads).toBe(2);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('shares one load between concurrent refreshes', async () => {
    const source = new StaticReferenceSource();
    const provider = new ReferenceProvider(source);

    const [a, b] = await Promise.all([provider.refresh(), provider.refresh()]);

    expect(a).toBe(b);
    expect(source.loads).toBe(1);
  });

  it('keeps the last good snapshot when a refresh fails', async () => {
    let fail = false;
    const source = new StaticReferenceSource((): ReferenceData => {
      if (fail) throw new Error('sheet unreachable');
      return referenceData();
    });
    const provider = new ReferenceProvider(source);
    const good = await provider.refresh();

    fail = true;

    expect(await provider.refresh()).toBe(good);
    expect(provider.peek()?.version).toBe(1);
  });

  it('fails when no snapshot was ever loaded', async () => {
    const provider = new ReferenceProvider(
      new StaticReferenceSource(() => {
        throw new Error('sheet unreachable');
      }),
    );

    await expect(provider.current()).rejects.toThrow(ReferenceDataUnavailableError);
  });
});
