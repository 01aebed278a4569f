import { z } from 'zod';

import { actionRecordSchema } from './action.js';

// ── Step record ───────────────────────────────────────────────

export const workflowStepRecordSchema = actionRecordSchema.extend({
  stepOrder: z.number().int(),
  description: z.string().optional(),
});

export type WorkflowStepRecord = z.infer<typeof workflowStepRecordSchema>;

// ── Workflow definition ───────────────────────────────────────

export const workflowDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  steps: z.array(workflowStepRecordSchema),
});

export type WorkflowDefinition = z.infer<typeof workflowDefinitionSchema>;
