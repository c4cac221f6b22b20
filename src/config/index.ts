/**
 * Configuration module.
 * Reads configuration files from disk and load options from env.
 * Zod-validated. Nothing is defaulted implicitly.
 */

export {
  SOURCE_DESCRIPTIONS,
  LEADING_PARAM_LIMIT,
  WEIGHT_ARITY,
  EXIT_CODES,
} from './defaults.js';
export { loadExtrinsicFile, detectFormat } from './loader.js';
export type { FileFormat } from './loader.js';
export { loadEnvOptions, mergeLoadOptions } from './env.js';
