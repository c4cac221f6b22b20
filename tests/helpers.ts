import { ConfigError } from '../src/core/errors.js';

// One row per feature type, sources M and T, in canonical order.
export const TWO_SOURCE_ROWS: readonly string[] = [
  'start 1 .3 M 1 1e+100 T 1 1e10',
  'stop 1 .3 M 1 1e+100 T 1 1e10',
  'tss 1 .8 M 1 1e+100 T 1 1e10',
  'tts 1 .8 M 1 1e+100 T 1 1e10',
  'ass 1 1 0.1 M 1 1e+100 T 1 1',
  'dss 1 1 0.1 M 1 1e+100 T 1 1',
  'exonpart 1 .98 .97 M 1 1e+100 T 2 1.5 10 1e10',
  'exon 1 1 M 1 1e+100 T 1 1',
  'intronpart 1 .999 M 1 1e+100 T 1 1',
  'intron 1 1e-3 M 1 1e+100 T 1 1e20',
  'CDSpart 1 .97 .97 M 1 1e+100 T 2 1.5 10 1e20',
  'CDS 1 1 M 1 1e+100 T 1 1',
  'UTRpart 1 .98 .98 M 1 1e+100 T 2 1.5 10 1e30',
  'UTR 1 1 M 1 1e+100 T 1 1',
  'irpart 1 1 M 1 1e+100 T 1 1',
  'nonexonpart 1 1 M 1 1e+100 T 1 1',
  'genicpart 1 1 M 1 1e+100 T 1 1',
];

export interface TextParts {
  sources?: string;
  parameters?: string[];
  group?: string;
  rows?: readonly string[];
}

/**
 * Builds configuration text. Without parameters or group the layout is:
 * line 1 comment, 2 [SOURCES], 3 source list, 4 [GENERAL], rows from 5.
 */
export function configText(parts: TextParts = {}): string {
  const lines = ['# test configuration', '[SOURCES]', parts.sources ?? 'M T'];
  if (parts.parameters !== undefined) {
    lines.push('[SOURCE-PARAMETERS]', ...parts.parameters);
  }
  if (parts.group !== undefined) {
    lines.push('[GROUP]', parts.group);
  }
  lines.push('[GENERAL]', ...(parts.rows ?? TWO_SOURCE_ROWS));
  return lines.join('\n') + '\n';
}

export function replaceRow(feature: string, row: string): string[] {
  return TWO_SOURCE_ROWS.map((r) => (r.split(' ')[0] === feature ? row : r));
}

export function catchConfigError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError to be thrown');
}
