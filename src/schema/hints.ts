import { z } from 'zod';

// ── Evidence sources ──────────────────────────────────────────

export const knownSourceSchema = z.enum(['M', 'P', 'E', 'C', 'D', 'R', 'T', 'W']);

export type KnownSource = z.infer<typeof knownSourceSchema>;

// Pipelines may register their own codes (e.g. "RM"), so configured
// sources are plain uppercase identifiers checked against a catalogue.
export const evidenceSourceSchema = z.string().regex(/^[A-Z][A-Z0-9]*$/);

export type EvidenceSource = z.infer<typeof evidenceSourceSchema>;

// ── Source flags ──────────────────────────────────────────────

export const sourceFlagSchema = z.enum(['individual_liability', '1group1gene']);

export type SourceFlag = z.infer<typeof sourceFlagSchema>;

// ── Feature types ─────────────────────────────────────────────

export const pointFeatureSchema = z.enum(['start', 'stop', 'tss', 'tts', 'ass', 'dss']);

export type PointFeature = z.infer<typeof pointFeatureSchema>;

export const spanFeatureSchema = z.enum([
  'exon',
  'intron',
  'CDS',
  'UTR',
  'irpart',
  'nonexonpart',
  'genicpart',
]);

export type SpanFeature = z.infer<typeof spanFeatureSchema>;

export const partFeatureSchema = z.enum(['exonpart', 'intronpart', 'CDSpart', 'UTRpart']);

export type PartFeature = z.infer<typeof partFeatureSchema>;

// Canonical row order, as the engine's own sample files list them.
export const featureTypeSchema = z.enum([
  'start',
  'stop',
  'tss',
  'tts',
  'ass',
  'dss',
  'exonpart',
  'exon',
  'intronpart',
  'intron',
  'CDSpart',
  'CDS',
  'UTRpart',
  'UTR',
  'irpart',
  'nonexonpart',
  'genicpart',
]);

export type FeatureType = z.infer<typeof featureTypeSchema>;

export const featureKindSchema = z.enum(['point', 'span', 'part']);

export type FeatureKind = z.infer<typeof featureKindSchema>;

// ── Sections ──────────────────────────────────────────────────

export const sectionNameSchema = z.enum(['SOURCES', 'SOURCE-PARAMETERS', 'GROUP', 'GENERAL']);

export type SectionName = z.infer<typeof sectionNameSchema>;

// ── Error kinds ───────────────────────────────────────────────

export const configErrorKindSchema = z.enum([
  'MalformedHeader',
  'DuplicateSection',
  'MissingRequiredSection',
  'EmptySection',
  'UnknownSource',
  'DuplicateSource',
  'UnknownFlag',
  'UnknownFeature',
  'ArityMismatch',
  'SourceOrderMismatch',
  'InvalidValue',
  'MissingFeatureRow',
  'DuplicateFeatureRow',
  'SchemaViolation',
]);

export type ConfigErrorKind = z.infer<typeof configErrorKindSchema>;
