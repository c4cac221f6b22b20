import {
  extrinsicConfigSchema,
  featureTypeSchema,
  knownSourceSchema,
  loadOptionsSchema,
  partFeatureSchema,
  pointFeatureSchema,
  sourceFlagSchema,
  spanFeatureSchema,
} from '../schema/index.js';
import type {
  BoundaryFlag,
  ExtrinsicConfig,
  FeatureKind,
  FeatureType,
  FeatureWeightRow,
  LeadingParams,
  LoadOptions,
  PartSourceWeight,
  SectionName,
  SourceFlag,
  SourceParameter,
} from '../schema/index.js';
import { LEADING_PARAM_LIMIT, WEIGHT_ARITY } from '../config/defaults.js';
import { ConfigError } from './errors.js';
import type { Located } from './errors.js';
import { FEATURE_TYPES, featureKind } from './features.js';

// ── Draft shape ──────────────────────────────────────────────
// Both the text reader and the document reader lower their input to
// this shape; every semantic check lives below.

export interface DraftGroup {
  source: Located<string>;
  numbers: Located<number>[];
}

export interface DraftRow {
  line?: number | undefined;
  feature: Located<string>;
  /** Boundary flag followed by the leading params. */
  leading: Located<number>[];
  groups: DraftGroup[];
}

export interface DraftParameter {
  source: Located<string>;
  flags: Located<string>[];
}

export interface ConfigDraft {
  sources: Located<string>[];
  parameters: DraftParameter[];
  group?: Located<string> | undefined;
  rows: DraftRow[];
}

type Where = Pick<Located<unknown>, 'line' | 'token'>;

function at(located: Where): Where {
  return { line: located.line, token: located.token };
}

// ── Section presence ─────────────────────────────────────────

export function requireSection(name: SectionName, present: boolean, line?: number): void {
  if (!present) {
    throw new ConfigError(
      'MissingRequiredSection',
      `[${name}] section is missing or empty`,
      { line, token: `[${name}]` },
    );
  }
}

// ── Source catalogue ─────────────────────────────────────────

export function sourceCatalogue(options: LoadOptions = {}): ReadonlySet<string> {
  const parsed = loadOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      'SchemaViolation',
      `invalid load options: ${issue?.message ?? 'unknown issue'}`,
      { token: issue?.path.join('.') },
    );
  }
  return new Set<string>([...knownSourceSchema.options, ...(parsed.data.extraSources ?? [])]);
}

function buildSourceList(codes: Located<string>[], catalogue: ReadonlySet<string>): string[] {
  const sources: string[] = [];
  for (const code of codes) {
    if (!catalogue.has(code.value)) {
      throw new ConfigError('UnknownSource', `unknown evidence source "${code.value}"`, at(code));
    }
    if (sources.includes(code.value)) {
      throw new ConfigError('DuplicateSource', `source "${code.value}" is declared twice`, at(code));
    }
    sources.push(code.value);
  }
  return sources;
}

function requireDeclared(code: Located<string>, sources: readonly string[]): void {
  if (!sources.includes(code.value)) {
    throw new ConfigError(
      'UnknownSource',
      `source "${code.value}" is not declared in [SOURCES]`,
      at(code),
    );
  }
}

// ── Source parameters ────────────────────────────────────────

function buildSourceParameters(
  parameters: DraftParameter[],
  sources: readonly string[],
): SourceParameter[] {
  const bySource = new Map<string, Set<SourceFlag>>();

  for (const parameter of parameters) {
    requireDeclared(parameter.source, sources);
    if (parameter.flags.length === 0) {
      throw new ConfigError(
        'ArityMismatch',
        `source "${parameter.source.value}" lists no flags`,
        at(parameter.source),
      );
    }
    const flags = bySource.get(parameter.source.value) ?? new Set<SourceFlag>();
    for (const flag of parameter.flags) {
      const parsed = sourceFlagSchema.safeParse(flag.value);
      if (!parsed.success) {
        throw new ConfigError('UnknownFlag', `unknown source flag "${flag.value}"`, at(flag));
      }
      flags.add(parsed.data);
    }
    bySource.set(parameter.source.value, flags);
  }

  return sources.flatMap((source) => {
    const flags = bySource.get(source);
    if (flags === undefined) return [];
    return [{ source, flags: sourceFlagSchema.options.filter((f) => flags.has(f)) }];
  });
}

// ── Numbers ──────────────────────────────────────────────────

function finiteValue(n: Located<number>): number {
  if (!Number.isFinite(n.value)) {
    throw new ConfigError(
      'InvalidValue',
      `"${n.token ?? String(n.value)}" is not a finite number`,
      at(n),
    );
  }
  return n.value;
}

function toBoundaryFlag(n: Located<number>): BoundaryFlag {
  const value = finiteValue(n);
  if (value === 0) return 0;
  if (value === 1) return 1;
  throw new ConfigError(
    'InvalidValue',
    `boundary flag must be 0 or 1, found "${n.token ?? String(value)}"`,
    at(n),
  );
}

function toLeadingParams(
  feature: FeatureType,
  values: Located<number>[],
  where: Where,
): LeadingParams {
  const limit = LEADING_PARAM_LIMIT[feature];
  const [first, second, ...rest] = values.map(finiteValue);
  if (first === undefined || rest.length > 0 || (second !== undefined && limit < 2)) {
    throw new ConfigError(
      'ArityMismatch',
      `${feature} takes ${limit === 1 ? '1' : '1 or 2'} parameter(s) after the boundary flag, found ${String(values.length)}`,
      where,
    );
  }
  return second === undefined ? [first] : [first, second];
}

// ── Weights ──────────────────────────────────────────────────

function readWeight(feature: FeatureType, kind: FeatureKind, group: DraftGroup): PartSourceWeight {
  const source = group.source.value;
  const allowed = WEIGHT_ARITY[kind];
  const values = group.numbers.map(finiteValue);
  const [malus, bonus, minFragmentLength, fullBonus] = values;

  if (!allowed.includes(values.length) || malus === undefined || bonus === undefined) {
    throw new ConfigError(
      'ArityMismatch',
      `${feature}: source "${source}" takes ${allowed.join(' or ')} numbers, found ${String(values.length)}`,
      at(group.source),
    );
  }
  if (minFragmentLength === undefined || fullBonus === undefined) {
    return { source, malus, bonus };
  }
  if (minFragmentLength < 0) {
    throw new ConfigError(
      'InvalidValue',
      `${feature}: source "${source}" has a negative minimum fragment length`,
      at(group.numbers[2] ?? group.source),
    );
  }
  return { source, malus, bonus, curve: { minFragmentLength, fullBonus } };
}

function readWeights(
  feature: FeatureType,
  row: DraftRow,
  sources: readonly string[],
): PartSourceWeight[] {
  const kind = featureKind(feature);
  const weights: PartSourceWeight[] = [];

  for (const group of row.groups) {
    requireDeclared(group.source, sources);
    const position = sources.indexOf(group.source.value);
    const expected = sources[weights.length];

    if (position < weights.length) {
      throw new ConfigError(
        'SourceOrderMismatch',
        `${feature}: source "${group.source.value}" is repeated or out of [SOURCES] order`,
        at(group.source),
      );
    }
    if (position > weights.length && expected !== undefined) {
      throw new ConfigError(
        'ArityMismatch',
        `${feature}: missing weights for source "${expected}"`,
        at(group.source),
      );
    }
    weights.push(readWeight(feature, kind, group));
  }

  const missing = sources[weights.length];
  if (missing !== undefined) {
    throw new ConfigError(
      'ArityMismatch',
      `${feature}: missing weights for source "${missing}"`,
      { line: row.line, token: row.feature.token },
    );
  }
  return weights;
}

// ── Rows ─────────────────────────────────────────────────────

function buildRow(feature: FeatureType, row: DraftRow, sources: readonly string[]): FeatureWeightRow {
  const [flag, ...params] = row.leading;
  if (flag === undefined) {
    throw new ConfigError('ArityMismatch', `${feature}: missing boundary flag`, {
      line: row.line,
      token: row.feature.token,
    });
  }
  const boundaryFlag = toBoundaryFlag(flag);
  const leading = toLeadingParams(feature, params, { line: row.line, token: row.feature.token });
  const weights = readWeights(feature, row, sources);

  const point = pointFeatureSchema.safeParse(feature);
  if (point.success) {
    return { kind: 'point', feature: point.data, boundaryFlag, params: leading, weights };
  }
  const span = spanFeatureSchema.safeParse(feature);
  if (span.success) {
    return { kind: 'span', feature: span.data, boundaryFlag, params: leading, weights };
  }
  return { kind: 'part', feature: partFeatureSchema.parse(feature), boundaryFlag, params: leading, weights };
}

function buildRows(rows: DraftRow[], sources: readonly string[]): FeatureWeightRow[] {
  const built = new Map<FeatureType, FeatureWeightRow>();

  for (const row of rows) {
    const parsed = featureTypeSchema.safeParse(row.feature.value);
    if (!parsed.success) {
      throw new ConfigError(
        'UnknownFeature',
        `unknown feature type "${row.feature.value}"`,
        at(row.feature),
      );
    }
    if (built.has(parsed.data)) {
      throw new ConfigError(
        'DuplicateFeatureRow',
        `feature "${parsed.data}" is listed more than once`,
        at(row.feature),
      );
    }
    built.set(parsed.data, buildRow(parsed.data, row, sources));
  }

  const missing = FEATURE_TYPES.filter((feature) => !built.has(feature));
  if (missing.length > 0) {
    throw new ConfigError(
      'MissingFeatureRow',
      `[GENERAL] lacks rows for: ${missing.join(', ')}`,
      { token: missing[0] },
    );
  }
  return FEATURE_TYPES.flatMap((feature) => {
    const row = built.get(feature);
    return row === undefined ? [] : [row];
  });
}

// ── Public API ───────────────────────────────────────────────

/**
 * Validate a draft and freeze it into an `ExtrinsicConfig`.
 * Throws `ConfigError` on the first violation.
 */
export function assembleConfig(draft: ConfigDraft, options: LoadOptions = {}): ExtrinsicConfig {
  requireSection('SOURCES', draft.sources.length > 0);
  requireSection('GENERAL', draft.rows.length > 0);

  const sources = buildSourceList(draft.sources, sourceCatalogue(options));
  const sourceParameters = buildSourceParameters(draft.parameters, sources);

  let group: string | undefined;
  if (draft.group !== undefined) {
    group = draft.group.value.trim();
    if (group.length === 0) {
      throw new ConfigError('EmptySection', '[GROUP] section has no label', at(draft.group));
    }
    // The label must survive as a single non-comment, non-header text line.
    if (/[\r\n]/.test(group) || group.startsWith('#') || group.startsWith('[')) {
      throw new ConfigError(
        'InvalidValue',
        '[GROUP] label must be one line and must not start with "#" or "["',
        at(draft.group),
      );
    }
  }

  const features = buildRows(draft.rows, sources);

  const parsed = extrinsicConfigSchema.safeParse({
    sources,
    sourceParameters,
    ...(group !== undefined ? { group } : {}),
    features,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError('SchemaViolation', issue?.message ?? 'configuration does not match its schema', {
      token: issue?.path.join('.'),
    });
  }
  return parsed.data;
}
