/**
 * Core module: the configuration loader and its read surface.
 * Pure logic. No IO, no CLI.
 */

export { loadExtrinsicConfig, isNumericToken } from './parser.js';
export { loadExtrinsicDocument, toExtrinsicDocument } from './document.js';
export { serializeExtrinsicConfig, formatNumber } from './serializer.js';
export { lookupBonus, sourceFlags, groupLabel, featureRow } from './lookup.js';
export type { BonusLookup } from './lookup.js';
export { ConfigError, isConfigError } from './errors.js';
export type { Located } from './errors.js';
export { FEATURE_TYPES, featureKind } from './features.js';
export { splitSections } from './sections.js';
export type { Section, ContentLine } from './sections.js';
