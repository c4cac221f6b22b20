import { sectionNameSchema } from '../schema/index.js';
import type { SectionName } from '../schema/index.js';
import { ConfigError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface ContentLine {
  /** 1-based line number in the original text. */
  line: number;
  text: string;
}

export interface Section {
  name: SectionName;
  line: number;
  lines: ContentLine[];
}

// ── Lines ────────────────────────────────────────────────────

export function contentLines(text: string): ContentLine[] {
  return text
    .split(/\r?\n/)
    .map((raw, index) => ({ line: index + 1, text: raw.trim() }))
    .filter((l) => l.text.length > 0 && !l.text.startsWith('#'));
}

export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((t) => t.length > 0);
}

// ── Sectioning ───────────────────────────────────────────────

const HEADER_PATTERN = /^\[([^\]]*)\]$/;

export function splitSections(text: string): Map<SectionName, Section> {
  const sections = new Map<SectionName, Section>();
  let current: Section | undefined;

  for (const content of contentLines(text)) {
    if (content.text.startsWith('[')) {
      const match = HEADER_PATTERN.exec(content.text);
      const parsed = sectionNameSchema.safeParse(match?.[1]?.trim());
      if (!parsed.success) {
        throw new ConfigError(
          'MalformedHeader',
          match ? `unknown section ${content.text}` : `malformed section header ${content.text}`,
          { line: content.line, token: content.text },
        );
      }
      if (sections.has(parsed.data)) {
        throw new ConfigError('DuplicateSection', `[${parsed.data}] appears more than once`, {
          line: content.line,
          token: content.text,
        });
      }
      current = { name: parsed.data, line: content.line, lines: [] };
      sections.set(parsed.data, current);
      continue;
    }

    if (current === undefined) {
      throw new ConfigError('MalformedHeader', 'expected a section header before the first entry', {
        line: content.line,
        token: tokenize(content.text)[0],
      });
    }
    current.lines.push(content);
  }

  return sections;
}
