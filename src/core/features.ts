import {
  featureTypeSchema,
  pointFeatureSchema,
  spanFeatureSchema,
} from '../schema/index.js';
import type { FeatureKind, FeatureType } from '../schema/index.js';

export const FEATURE_TYPES: readonly FeatureType[] = featureTypeSchema.options;

export function featureKind(feature: FeatureType): FeatureKind {
  if (pointFeatureSchema.safeParse(feature).success) return 'point';
  if (spanFeatureSchema.safeParse(feature).success) return 'span';
  return 'part';
}

