import { describe, it, expect } from 'vitest';

import { loadExtrinsicConfig } from '../src/core/parser.js';
import { ConfigError } from '../src/core/errors.js';
import {
  generateJSON,
  generateMarkdown,
  serializeJSON,
  summarize,
} from '../src/report/reporter.js';
import { validationReportSchema } from '../src/schema/index.js';
import { configText } from './helpers.js';

const config = loadExtrinsicConfig(
  configText({ parameters: ['T individual_liability'], group: 'report-suite' }),
);

describe('summarize', () => {
  it('should count rows, flagged sources and curves', () => {
    expect(summarize(config)).toEqual({
      sources: ['M', 'T'],
      group: 'report-suite',
      featureRows: 17,
      flaggedSources: ['T'],
      curvedWeights: 3,
    });
  });
});

describe('generateJSON', () => {
  it('should report valid and invalid files', () => {
    const report = generateJSON(
      [
        { file: 'good.cfg', ok: true, config },
        {
          file: 'bad.cfg',
          ok: false,
          error: new ConfigError('UnknownFlag', 'unknown source flag "x"', { line: 4, token: 'x' }),
        },
      ],
      1,
    );

    expect(report.version).toBe('1.0');
    expect(report.valid).toBe(false);
    expect(report.exitCode).toBe(1);
    expect(report.files[0]?.summary?.featureRows).toBe(17);
    expect(report.files[1]).toEqual({
      file: 'bad.cfg',
      valid: false,
      error: {
        kind: 'UnknownFlag',
        message: 'line 4: unknown source flag "x"',
        line: 4,
        token: 'x',
      },
    });
    expect(validationReportSchema.safeParse(report).success).toBe(true);
  });

  it('should report other failures by message only', () => {
    const report = generateJSON([{ file: 'gone.cfg', ok: false, error: new Error('boom') }], 4);
    expect(report.files[0]?.error).toEqual({ message: 'boom' });
  });
});

describe('serializeJSON', () => {
  it('should sort keys at every level', () => {
    expect(serializeJSON({ b: 1, a: { d: 1, c: 2 } })).toBe(
      '{\n  "a": {\n    "c": 2,\n    "d": 1\n  },\n  "b": 1\n}',
    );
  });
});

describe('generateMarkdown', () => {
  const lines = generateMarkdown(config).split('\n');

  it('should render the header table', () => {
    expect(lines[0]).toBe('# Extrinsic Hint Configuration');
    expect(lines).toContain('| **Group** | report-suite |');
    expect(lines).toContain('| **Sources** | M T |');
  });

  it('should describe sources with their flags', () => {
    expect(lines).toContain('| M | manual anchor | - |');
    expect(lines).toContain('| T | transMapped RefSeqs | individual_liability |');
  });

  it('should render one weight row per feature', () => {
    expect(lines).toContain('| Feature | Kind | Boundary | Params | M | T |');
    expect(lines).toContain('|---|---|---|---|---|---|');
    expect(lines).toContain('| start | point | 1 | 0.3 | 1 / 1e+100 | 1 / 1e+10 |');
    expect(lines).toContain(
      '| exonpart | part | 1 | 0.98 0.97 | 1 / 1e+100 | 2 / 1.5 (≥10bp: 1e+10) |',
    );
  });
});
