import { z } from 'zod';

import { actionStatusSchema, runStatusSchema } from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Step output ─────────────────────────────────────────────

export const jsonOutputStepSchema = z.object({
  index: z.number().int().nonnegative(),
  verb: z.string(),
  status: actionStatusSchema,
  message: z.string(),
  data: z.record(z.unknown()),
});

export type JsonOutputStep = z.infer<typeof jsonOutputStepSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  status: runStatusSchema,
  runId: z.string().min(1),
  workflowId: z.string().min(1),
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  steps: z.array(jsonOutputStepSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
