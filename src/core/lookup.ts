import type {
  ExtrinsicConfig,
  FeatureType,
  FeatureWeightRow,
  ForgivenessCurve,
  PartSourceWeight,
  SourceFlag,
} from '../schema/index.js';

// ── Public types ─────────────────────────────────────────────

export interface BonusLookup {
  malus: number;
  /** Base bonus, or the curve's full bonus once the overlap reaches its threshold. */
  bonus: number;
  curve?: ForgivenessCurve;
}

// ── Accessors ────────────────────────────────────────────────

export function featureRow(config: ExtrinsicConfig, feature: FeatureType): FeatureWeightRow {
  const row = config.features.find((r) => r.feature === feature);
  if (row === undefined) {
    throw new RangeError(`configuration has no row for feature "${feature}"`);
  }
  return row;
}

function requireSource(config: ExtrinsicConfig, source: string): void {
  if (!config.sources.includes(source)) {
    throw new RangeError(
      `source "${source}" is not declared (known: ${config.sources.join(' ')})`,
    );
  }
}

/**
 * Malus and bonus for hints of `source` supporting `feature`.
 * With `overlapLength` on a partial-overlap feature, the forgiveness
 * curve decides which bonus applies.
 */
export function lookupBonus(
  config: ExtrinsicConfig,
  feature: FeatureType,
  source: string,
  overlapLength?: number,
): BonusLookup {
  requireSource(config, source);
  if (overlapLength !== undefined && !(Number.isFinite(overlapLength) && overlapLength >= 0)) {
    throw new RangeError(`overlap length must be a non-negative number, got ${String(overlapLength)}`);
  }

  const row = featureRow(config, feature);
  const weights: readonly PartSourceWeight[] = row.weights;
  const weight = weights.find((w) => w.source === source);
  if (weight === undefined) {
    throw new RangeError(`feature "${feature}" has no weights for source "${source}"`);
  }

  const curve = weight.curve;
  if (curve === undefined) {
    return { malus: weight.malus, bonus: weight.bonus };
  }

  const bonus =
    overlapLength !== undefined && overlapLength >= curve.minFragmentLength
      ? curve.fullBonus
      : weight.bonus;
  return { malus: weight.malus, bonus, curve };
}

export function sourceFlags(config: ExtrinsicConfig, source: string): ReadonlySet<SourceFlag> {
  requireSource(config, source);
  const parameter = config.sourceParameters.find((p) => p.source === source);
  return new Set(parameter?.flags ?? []);
}

export function groupLabel(config: ExtrinsicConfig): string {
  return config.group ?? '';
}
