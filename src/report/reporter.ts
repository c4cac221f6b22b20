import { knownSourceSchema, REPORT_VERSION } from '../schema/index.js';
import type {
  ExtrinsicConfig,
  FeatureWeightRow,
  FileReport,
  PartSourceWeight,
  ReportError,
  ReportSummary,
  ValidationReport,
} from '../schema/index.js';
import { SOURCE_DESCRIPTIONS } from '../config/defaults.js';
import { formatNumber, groupLabel, isConfigError } from '../core/index.js';

// Re-export contract types for consumers
export type { ValidationReport, FileReport };

// ── Outcomes ─────────────────────────────────────────────────

export type LoadOutcome =
  | { file: string; ok: true; config: ExtrinsicConfig }
  | { file: string; ok: false; error: unknown };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(outcomes: LoadOutcome[], exitCode: number): ValidationReport {
  return {
    version: REPORT_VERSION,
    valid: outcomes.every((o) => o.ok),
    exitCode,
    files: outcomes.map(outcomeToJSON),
  };
}

function outcomeToJSON(outcome: LoadOutcome): FileReport {
  if (outcome.ok) {
    return { file: outcome.file, valid: true, summary: summarize(outcome.config) };
  }
  return { file: outcome.file, valid: false, error: errorToJSON(outcome.error) };
}

export function summarize(config: ExtrinsicConfig): ReportSummary {
  return {
    sources: [...config.sources],
    group: groupLabel(config),
    featureRows: config.features.length,
    flaggedSources: config.sourceParameters.map((p) => p.source),
    curvedWeights: config.features.reduce((n, row) => n + curvedWeights(row).length, 0),
  };
}

function errorToJSON(err: unknown): ReportError {
  if (isConfigError(err)) {
    return {
      kind: err.kind,
      message: err.message,
      ...(err.line !== undefined ? { line: err.line } : {}),
      ...(err.token !== undefined ? { token: err.token } : {}),
    };
  }
  return { message: err instanceof Error ? err.message : String(err) };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: unknown): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    sorted[k] = v;
  }
  return sorted;
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(config: ExtrinsicConfig): string {
  const lines: string[] = [];

  lines.push(`# Extrinsic Hint Configuration`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Group** | ${escapeMarkdownCell(groupLabel(config) || '-')} |`);
  lines.push(`| **Sources** | ${config.sources.join(' ')} |`);
  lines.push(`| **Feature rows** | ${String(config.features.length)} |`);
  lines.push('');

  lines.push(`## Sources`);
  lines.push('');
  lines.push(`| Code | Description | Flags |`);
  lines.push(`|------|-------------|-------|`);
  for (const source of config.sources) {
    const flags = config.sourceParameters.find((p) => p.source === source)?.flags ?? [];
    lines.push(
      `| ${source} | ${describeSource(source)} | ${flags.length > 0 ? flags.join(', ') : '-'} |`,
    );
  }
  lines.push('');

  lines.push(`## Feature Weights`);
  lines.push('');
  lines.push(`| Feature | Kind | Boundary | Params | ${config.sources.join(' | ')} |`);
  lines.push(`|${'---|'.repeat(4 + config.sources.length)}`);
  for (const row of config.features) {
    const cells = [
      row.feature,
      row.kind,
      String(row.boundaryFlag),
      row.params.map(formatNumber).join(' '),
      ...weightsOf(row).map(formatWeight),
    ];
    lines.push(`| ${cells.join(' | ')} |`);
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function weightsOf(row: FeatureWeightRow): readonly PartSourceWeight[] {
  return row.weights;
}

function curvedWeights(row: FeatureWeightRow): PartSourceWeight[] {
  return weightsOf(row).filter((w) => w.curve !== undefined);
}

function describeSource(source: string): string {
  const known = knownSourceSchema.safeParse(source);
  return known.success ? SOURCE_DESCRIPTIONS[known.data] : 'pipeline-specific';
}

function formatWeight(weight: PartSourceWeight): string {
  const base = `${formatNumber(weight.malus)} / ${formatNumber(weight.bonus)}`;
  if (weight.curve === undefined) return base;
  return `${base} (≥${formatNumber(weight.curve.minFragmentLength)}bp: ${formatNumber(weight.curve.fullBonus)})`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
