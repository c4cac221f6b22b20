import type { ConfigErrorKind } from '../schema/index.js';
import { EXIT_CODES } from '../config/defaults.js';

// ── Location ─────────────────────────────────────────────────

/** Where an offending value came from: a text line, a document path, or both. */
export interface Located<T> {
  value: T;
  line?: number | undefined;
  token?: string | undefined;
}

// ── Error ────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = EXIT_CODES.INVALID;
  readonly kind: ConfigErrorKind;
  readonly line: number | undefined;
  readonly token: string | undefined;

  constructor(
    kind: ConfigErrorKind,
    message: string,
    at: { line?: number | undefined; token?: string | undefined } = {},
  ) {
    super(at.line !== undefined ? `line ${String(at.line)}: ${message}` : message);
    this.name = 'ConfigError';
    this.kind = kind;
    this.line = at.line;
    this.token = at.token;
  }
}

export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError;
}
