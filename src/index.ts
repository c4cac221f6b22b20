/**
 * hintcfg: loader and validator for extrinsic hint configuration files.
 */

export * from './schema/index.js';
export * from './core/index.js';
export {
  loadExtrinsicFile,
  detectFormat,
  loadEnvOptions,
  mergeLoadOptions,
  SOURCE_DESCRIPTIONS,
} from './config/index.js';
export type { FileFormat } from './config/index.js';
export { generateJSON, generateMarkdown, serializeJSON, summarize } from './report/index.js';
export type { LoadOutcome } from './report/index.js';
