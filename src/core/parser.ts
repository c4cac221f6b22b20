import type { ExtrinsicConfig, LoadOptions } from '../schema/index.js';
import { ConfigError } from './errors.js';
import type { Located } from './errors.js';
import { assembleConfig, requireSection } from './assemble.js';
import type { ConfigDraft, DraftGroup, DraftParameter, DraftRow } from './assemble.js';
import { splitSections, tokenize } from './sections.js';
import type { ContentLine, Section } from './sections.js';

// ── Tokens ───────────────────────────────────────────────────

const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const CODE_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;

export function isNumericToken(token: string): boolean {
  return NUMBER_PATTERN.test(token);
}

function locatedTokens(content: ContentLine): Located<string>[] {
  return tokenize(content.text).map((token) => ({ value: token, line: content.line, token }));
}

function locatedNumber(token: string, line: number): Located<number> {
  return { value: Number(token), line, token };
}

// ── Sections ─────────────────────────────────────────────────

function readParameters(section: Section | undefined): DraftParameter[] {
  if (section === undefined) return [];
  return section.lines.map((content) => {
    const [source, ...flags] = locatedTokens(content);
    if (source === undefined) {
      throw new ConfigError('ArityMismatch', 'empty source parameter row', { line: content.line });
    }
    return { source, flags };
  });
}

function readGroup(section: Section | undefined): Located<string> | undefined {
  if (section === undefined) return undefined;
  const first = section.lines[0];
  return first === undefined
    ? { value: '', line: section.line, token: '[GROUP]' }
    : { value: first.text, line: first.line, token: first.text };
}

function readRow(content: ContentLine): DraftRow {
  const tokens = tokenize(content.text);
  const [feature, ...rest] = tokens;
  if (feature === undefined) {
    throw new ConfigError('ArityMismatch', 'empty [GENERAL] row', { line: content.line });
  }

  const leading: Located<number>[] = [];
  const groups: DraftGroup[] = [];
  let index = 0;

  while (index < rest.length && isNumericToken(rest[index] ?? '')) {
    leading.push(locatedNumber(rest[index] ?? '', content.line));
    index++;
  }

  while (index < rest.length) {
    const code = rest[index] ?? '';
    if (!CODE_PATTERN.test(code)) {
      throw new ConfigError('InvalidValue', `expected a source code or a number, found "${code}"`, {
        line: content.line,
        token: code,
      });
    }
    const group: DraftGroup = { source: { value: code, line: content.line, token: code }, numbers: [] };
    index++;
    while (index < rest.length && isNumericToken(rest[index] ?? '')) {
      group.numbers.push(locatedNumber(rest[index] ?? '', content.line));
      index++;
    }
    groups.push(group);
  }

  return {
    line: content.line,
    feature: { value: feature, line: content.line, token: feature },
    leading,
    groups,
  };
}

// ── Public API ───────────────────────────────────────────────

/**
 * Parse extrinsic hint configuration text into a frozen `ExtrinsicConfig`.
 * Pure and synchronous; throws `ConfigError` on the first violation.
 */
export function loadExtrinsicConfig(text: string, options: LoadOptions = {}): ExtrinsicConfig {
  const sections = splitSections(text);
  const sources = sections.get('SOURCES');
  const general = sections.get('GENERAL');

  requireSection('SOURCES', (sources?.lines.length ?? 0) > 0, sources?.line);
  requireSection('GENERAL', (general?.lines.length ?? 0) > 0, general?.line);

  const draft: ConfigDraft = {
    sources: (sources?.lines ?? []).flatMap(locatedTokens),
    parameters: readParameters(sections.get('SOURCE-PARAMETERS')),
    group: readGroup(sections.get('GROUP')),
    rows: (general?.lines ?? []).map(readRow),
  };

  return assembleConfig(draft, options);
}
