import { z } from 'zod';

import {
  evidenceSourceSchema,
  partFeatureSchema,
  pointFeatureSchema,
  sourceFlagSchema,
  spanFeatureSchema,
} from './hints.js';

// ── Weights ───────────────────────────────────────────────────

const finite = z.number().finite();

const sourceWeightFields = {
  source: evidenceSourceSchema,
  malus: finite,
  bonus: finite,
};

export const sourceWeightSchema = z.object(sourceWeightFields).readonly();

export type SourceWeight = z.infer<typeof sourceWeightSchema>;

/**
 * Partial-overlap forgiveness: hints overlapping at least
 * `minFragmentLength` bases earn `fullBonus` instead of the base bonus.
 */
export const forgivenessCurveSchema = z
  .object({
    minFragmentLength: finite.nonnegative(),
    fullBonus: finite,
  })
  .readonly();

export type ForgivenessCurve = z.infer<typeof forgivenessCurveSchema>;

export const partSourceWeightSchema = z
  .object({
    ...sourceWeightFields,
    curve: forgivenessCurveSchema.optional(),
  })
  .readonly();

export type PartSourceWeight = z.infer<typeof partSourceWeightSchema>;

// ── Feature rows ──────────────────────────────────────────────

export const boundaryFlagSchema = z.union([z.literal(0), z.literal(1)]);

export type BoundaryFlag = z.infer<typeof boundaryFlagSchema>;

export const leadingParamsSchema = z.union([
  z.tuple([finite]).readonly(),
  z.tuple([finite, finite]).readonly(),
]);

export type LeadingParams = z.infer<typeof leadingParamsSchema>;

const rowFields = {
  boundaryFlag: boundaryFlagSchema,
  params: leadingParamsSchema,
};

export const pointRowSchema = z.object({
  ...rowFields,
  kind: z.literal('point'),
  feature: pointFeatureSchema,
  weights: z.array(sourceWeightSchema).readonly(),
});

export const spanRowSchema = z.object({
  ...rowFields,
  kind: z.literal('span'),
  feature: spanFeatureSchema,
  weights: z.array(sourceWeightSchema).readonly(),
});

export const partRowSchema = z.object({
  ...rowFields,
  kind: z.literal('part'),
  feature: partFeatureSchema,
  weights: z.array(partSourceWeightSchema).readonly(),
});

export const featureRowSchema = z
  .discriminatedUnion('kind', [pointRowSchema, spanRowSchema, partRowSchema])
  .readonly();

export type FeatureWeightRow = z.infer<typeof featureRowSchema>;

export type PointFeatureRow = Extract<FeatureWeightRow, { kind: 'point' }>;
export type SpanFeatureRow = Extract<FeatureWeightRow, { kind: 'span' }>;
export type PartFeatureRow = Extract<FeatureWeightRow, { kind: 'part' }>;

// ── Source parameters ─────────────────────────────────────────

export const sourceParameterSchema = z
  .object({
    source: evidenceSourceSchema,
    flags: z.array(sourceFlagSchema).min(1).readonly(),
  })
  .readonly();

export type SourceParameter = z.infer<typeof sourceParameterSchema>;

// ── Full configuration ────────────────────────────────────────

export const extrinsicConfigSchema = z
  .object({
    sources: z.array(evidenceSourceSchema).min(1).readonly(),
    sourceParameters: z.array(sourceParameterSchema).readonly(),
    group: z.string().min(1).optional(),
    features: z.array(featureRowSchema).readonly(),
  })
  .readonly();

export type ExtrinsicConfig = z.infer<typeof extrinsicConfigSchema>;

// ── Load options ──────────────────────────────────────────────

export const loadOptionsSchema = z.object({
  extraSources: z.array(evidenceSourceSchema).optional(),
});

export type LoadOptions = z.infer<typeof loadOptionsSchema>;
