import { describe, it, expect } from 'vitest';

import { loadEnvOptions, mergeLoadOptions } from '../src/config/env.js';

describe('loadEnvOptions', () => {
  it('should split extra sources on commas and whitespace', () => {
    expect(loadEnvOptions({ HINTCFG_EXTRA_SOURCES: 'RM, XNT  U' })).toEqual({
      extraSources: ['RM', 'XNT', 'U'],
    });
  });

  it('should default to no extra sources', () => {
    expect(loadEnvOptions({})).toEqual({ extraSources: [] });
  });

  it('should reject malformed source codes', () => {
    expect(() => loadEnvOptions({ HINTCFG_EXTRA_SOURCES: 'rm' })).toThrow();
  });
});

describe('mergeLoadOptions', () => {
  it('should union extra sources in first-seen order', () => {
    expect(
      mergeLoadOptions({ extraSources: ['RM'] }, {}, { extraSources: ['XNT', 'RM'] }),
    ).toEqual({ extraSources: ['RM', 'XNT'] });
  });
});
