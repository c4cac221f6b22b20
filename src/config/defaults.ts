/**
 * Built-in catalogue of the extrinsic hint format.
 * Sources outside it are registered per load via `extraSources`.
 */

import type {
  FeatureKind,
  FeatureType,
  KnownSource,
} from '../schema/index.js';

export const SOURCE_DESCRIPTIONS: Readonly<Record<KnownSource, string>> = {
  M: 'manual anchor',
  P: 'protein database hit',
  E: 'EST/cDNA database hit',
  C: 'combined EST/protein database hit',
  D: 'Dialign',
  R: 'retroposed genes',
  T: 'transMapped RefSeqs',
  W: 'wiggle track coverage from RNA-Seq',
};

// Leading params after the boundary flag: every row takes one, splice
// sites and partial-overlap rows may add a local malus as a second.
export const LEADING_PARAM_LIMIT: Readonly<Record<FeatureType, 1 | 2>> = {
  start: 1,
  stop: 1,
  tss: 1,
  tts: 1,
  ass: 2,
  dss: 2,
  exonpart: 2,
  exon: 1,
  intronpart: 2,
  intron: 1,
  CDSpart: 2,
  CDS: 1,
  UTRpart: 2,
  UTR: 1,
  irpart: 1,
  nonexonpart: 1,
  genicpart: 1,
};

// Numbers following a source code: malus and bonus, plus the
// forgiveness curve on partial-overlap features.
export const WEIGHT_ARITY: Readonly<Record<FeatureKind, readonly number[]>> = {
  point: [2],
  span: [2],
  part: [2, 4],
};

export const EXIT_CODES = {
  VALID: 0,
  INVALID: 1,
  FAILURE: 4,
} as const;

export const ENV_EXTRA_SOURCES = 'HINTCFG_EXTRA_SOURCES';
