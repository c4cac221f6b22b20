import { describe, it, expect } from 'vitest';

import { loadExtrinsicConfig } from '../src/core/parser.js';
import { featureRow, groupLabel, lookupBonus, sourceFlags } from '../src/core/lookup.js';
import { configText } from './helpers.js';

const config = loadExtrinsicConfig(
  configText({ parameters: ['T 1group1gene'], group: 'lookup-suite' }),
);

describe('lookupBonus', () => {
  it('should include the curve for partial-overlap weights', () => {
    expect(lookupBonus(config, 'exonpart', 'T')).toEqual({
      malus: 2,
      bonus: 1.5,
      curve: { minFragmentLength: 10, fullBonus: 1e10 },
    });
  });

  it('should keep the base bonus below the fragment threshold', () => {
    expect(lookupBonus(config, 'CDSpart', 'T', 9).bonus).toBe(1.5);
    expect(lookupBonus(config, 'CDSpart', 'T', 0).bonus).toBe(1.5);
  });

  it('should apply the full bonus from the fragment threshold on', () => {
    expect(lookupBonus(config, 'CDSpart', 'T', 10).bonus).toBe(1e20);
    expect(lookupBonus(config, 'UTRpart', 'T', 250).bonus).toBe(1e30);
  });

  it('should ignore the overlap where no curve is configured', () => {
    expect(lookupBonus(config, 'exonpart', 'M', 100)).toEqual({ malus: 1, bonus: 1e100 });
    expect(lookupBonus(config, 'intron', 'T', 100)).toEqual({ malus: 1, bonus: 1e20 });
  });

  it('should reject sources outside the source list', () => {
    expect(() => lookupBonus(config, 'start', 'W')).toThrow(RangeError);
    expect(() => lookupBonus(config, 'start', 'W')).toThrow(
      'source "W" is not declared (known: M T)',
    );
  });

  it('should reject negative or non-finite overlaps', () => {
    expect(() => lookupBonus(config, 'exonpart', 'T', -1)).toThrow(RangeError);
    expect(() => lookupBonus(config, 'exonpart', 'T', Number.NaN)).toThrow(RangeError);
  });
});

describe('featureRow', () => {
  it('should return the row for a feature type', () => {
    const row = featureRow(config, 'intronpart');

    expect(row.kind).toBe('part');
    expect(row.params).toEqual([0.999]);
  });
});

describe('sourceFlags', () => {
  it('should return the flags of a parameterized source', () => {
    expect([...sourceFlags(config, 'T')]).toEqual(['1group1gene']);
  });

  it('should return an empty set for sources without parameters', () => {
    expect(sourceFlags(config, 'M').size).toBe(0);
  });

  it('should reject undeclared sources', () => {
    expect(() => sourceFlags(config, 'P')).toThrow(RangeError);
  });
});

describe('groupLabel', () => {
  it('should return the declared label', () => {
    expect(groupLabel(config)).toBe('lookup-suite');
  });

  it('should return an empty string without a [GROUP] section', () => {
    expect(groupLabel(loadExtrinsicConfig(configText()))).toBe('');
  });
});
