import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import type { ExtrinsicConfig, LoadOptions } from '../schema/index.js';
import { ConfigError, loadExtrinsicConfig, loadExtrinsicDocument } from '../core/index.js';

// ── Format detection ─────────────────────────────────────────

export type FileFormat = 'cfg' | 'json' | 'yaml';

export function detectFormat(configPath: string): FileFormat {
  const lower = configPath.toLowerCase();
  if (lower.endsWith('.json')) return 'json';
  if (lower.endsWith('.yaml') || lower.endsWith('.yml')) return 'yaml';
  return 'cfg';
}

function parseStructured(raw: string, format: 'json' | 'yaml'): unknown {
  try {
    return format === 'json' ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError('SchemaViolation', `unreadable ${format.toUpperCase()}: ${message}`);
  }
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate an extrinsic hint configuration file.
 * `.json` and `.yaml` files hold the structured form; anything else is
 * read as the section-delimited text format.
 */
export async function loadExtrinsicFile(
  configPath: string,
  options: LoadOptions = {},
): Promise<ExtrinsicConfig> {
  const raw = await readFile(configPath, 'utf-8');
  const format = detectFormat(configPath);

  if (format === 'cfg') {
    return loadExtrinsicConfig(raw, options);
  }
  return loadExtrinsicDocument(parseStructured(raw, format), options);
}
