import { z } from 'zod';

import { evidenceSourceSchema } from '../schema/index.js';
import type { LoadOptions } from '../schema/index.js';
import { ENV_EXTRA_SOURCES } from './defaults.js';

// ── Env schema ───────────────────────────────────────────────

export const envOptionsSchema = z.object({
  extraSources: z.array(evidenceSourceSchema),
});

// ── Env loader ───────────────────────────────────────────────

/** Extra evidence sources from `HINTCFG_EXTRA_SOURCES` (comma or space separated). */
export function loadEnvOptions(env: NodeJS.ProcessEnv = process.env): LoadOptions {
  const raw = env[ENV_EXTRA_SOURCES] ?? '';
  return envOptionsSchema.parse({
    extraSources: raw.split(/[\s,]+/).filter((code) => code.length > 0),
  });
}

export function mergeLoadOptions(...options: LoadOptions[]): LoadOptions {
  const extraSources = [...new Set(options.flatMap((o) => o.extraSources ?? []))];
  return { extraSources };
}
