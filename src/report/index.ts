/**
 * Report module.
 * Versioned JSON validation reports and Markdown renderings.
 */

export {
  generateJSON,
  generateMarkdown,
  serializeJSON,
  summarize,
} from './reporter.js';
export type { LoadOutcome, ValidationReport, FileReport } from './reporter.js';
