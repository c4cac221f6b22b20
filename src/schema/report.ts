import { z } from 'zod';

import { configErrorKindSchema, evidenceSourceSchema } from './hints.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const REPORT_VERSION = '1.0' as const;

// ── Per-file result ─────────────────────────────────────────

export const reportErrorSchema = z.object({
  kind: configErrorKindSchema.optional(),
  message: z.string().min(1),
  line: z.number().int().positive().optional(),
  token: z.string().optional(),
});

export type ReportError = z.infer<typeof reportErrorSchema>;

export const reportSummarySchema = z.object({
  sources: z.array(evidenceSourceSchema).min(1),
  group: z.string(),
  featureRows: z.number().int().nonnegative(),
  flaggedSources: z.array(evidenceSourceSchema),
  curvedWeights: z.number().int().nonnegative(),
});

export type ReportSummary = z.infer<typeof reportSummarySchema>;

export const fileReportSchema = z.object({
  file: z.string().min(1),
  valid: z.boolean(),
  summary: reportSummarySchema.optional(),
  error: reportErrorSchema.optional(),
});

export type FileReport = z.infer<typeof fileReportSchema>;

// ── Root output ─────────────────────────────────────────────

export const validationReportSchema = z.object({
  version: z.literal(REPORT_VERSION),
  valid: z.boolean(),
  exitCode: z.number().int().nonnegative(),
  files: z.array(fileReportSchema),
});

export type ValidationReport = z.infer<typeof validationReportSchema>;
