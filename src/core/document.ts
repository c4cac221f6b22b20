import { extrinsicDocumentSchema } from '../schema/index.js';
import type {
  DocumentRow,
  ExtrinsicConfig,
  ExtrinsicDocument,
  LoadOptions,
} from '../schema/index.js';
import { ConfigError } from './errors.js';
import type { Located } from './errors.js';
import { assembleConfig } from './assemble.js';
import type { ConfigDraft, DraftRow } from './assemble.js';

// ── Lowering ─────────────────────────────────────────────────

function locatedNumbers(values: number[], path: string): Located<number>[] {
  return values.map((value, i) => ({ value, token: `${path}[${String(i)}]` }));
}

function lowerRow(feature: string, row: DocumentRow): DraftRow {
  const path = `features.${feature}`;
  return {
    feature: { value: feature, token: path },
    leading: [
      { value: row.boundaryFlag, token: `${path}.boundaryFlag` },
      ...locatedNumbers(row.params, `${path}.params`),
    ],
    groups: Object.entries(row.weights).map(([source, numbers]) => ({
      source: { value: source, token: `${path}.weights.${source}` },
      numbers: locatedNumbers(numbers, `${path}.weights.${source}`),
    })),
  };
}

function lowerDocument(doc: ExtrinsicDocument): ConfigDraft {
  return {
    sources: doc.sources.map((value, i) => ({ value, token: `sources[${String(i)}]` })),
    parameters: Object.entries(doc.sourceParameters ?? {}).map(([source, flags]) => ({
      source: { value: source, token: `sourceParameters.${source}` },
      flags: flags.map((value, i) => ({
        value,
        token: `sourceParameters.${source}[${String(i)}]`,
      })),
    })),
    group: doc.group === undefined ? undefined : { value: doc.group, token: 'group' },
    rows: Object.entries(doc.features).map(([feature, row]) => lowerRow(feature, row)),
  };
}

// ── Public API ───────────────────────────────────────────────

/**
 * Load the structured (JSON / YAML) form of a configuration.
 * Shape errors surface as `SchemaViolation`; everything else goes
 * through the same checks as the text form.
 */
export function loadExtrinsicDocument(value: unknown, options: LoadOptions = {}): ExtrinsicConfig {
  const parsed = extrinsicDocumentSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.') ?? '';
    throw new ConfigError(
      'SchemaViolation',
      `${path.length > 0 ? path : 'document'}: ${issue?.message ?? 'invalid document'}`,
      { token: path },
    );
  }
  return assembleConfig(lowerDocument(parsed.data), options);
}

export function toExtrinsicDocument(config: ExtrinsicConfig): ExtrinsicDocument {
  const features: Record<string, DocumentRow> = {};
  for (const row of config.features) {
    const weights: Record<string, number[]> = {};
    for (const weight of row.weights) {
      const curve = 'curve' in weight ? weight.curve : undefined;
      weights[weight.source] =
        curve === undefined
          ? [weight.malus, weight.bonus]
          : [weight.malus, weight.bonus, curve.minFragmentLength, curve.fullBonus];
    }
    features[row.feature] = { boundaryFlag: row.boundaryFlag, params: [...row.params], weights };
  }

  const sourceParameters: Record<string, string[]> = {};
  for (const parameter of config.sourceParameters) {
    sourceParameters[parameter.source] = [...parameter.flags];
  }

  return {
    sources: [...config.sources],
    ...(config.sourceParameters.length > 0 ? { sourceParameters } : {}),
    ...(config.group !== undefined ? { group: config.group } : {}),
    features,
  };
}
