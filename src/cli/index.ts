/**
 * CLI module: command wiring over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerValidateCommand, registerShowCommand, renderConfig } from './run.js';
export type { ShowFormat } from './run.js';
