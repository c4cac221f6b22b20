import { z } from 'zod';

// ── Structured (JSON / YAML) form ─────────────────────────────
// Mirrors the text layout: each source maps to the same number list
// that follows its code on a [GENERAL] row.

const numberListSchema = z.array(z.number());

export const documentRowSchema = z
  .object({
    boundaryFlag: z.number(),
    params: numberListSchema,
    weights: z.record(z.string(), numberListSchema),
  })
  .strict();

export type DocumentRow = z.infer<typeof documentRowSchema>;

export const extrinsicDocumentSchema = z
  .object({
    sources: z.array(z.string()),
    sourceParameters: z.record(z.string(), z.array(z.string())).optional(),
    group: z.string().optional(),
    features: z.record(z.string(), documentRowSchema),
  })
  .strict();

export type ExtrinsicDocument = z.infer<typeof extrinsicDocumentSchema>;
