import { z } from 'zod';

// ── ActionResult ──────────────────────────────────────────────

export const actionStatusSchema = z.enum(['success', 'error']);

export type ActionStatus = z.infer<typeof actionStatusSchema>;

export const actionResultSchema = z.object({
  status: actionStatusSchema,
  message: z.string(),
  verb: z.string().optional(),
  url: z.string().optional(),
  text: z.string().nullable().optional(),
  html: z.string().optional(),
  attribute: z.string().nullable().optional(),
  list: z.array(z.string().nullable()).optional(),
});

export type ActionResult = Readonly<z.infer<typeof actionResultSchema>>;

/** Verb-specific fields a successful action may carry. */
export type ActionPayload = Omit<ActionResult, 'status' | 'message' | 'verb'>;

export function successResult(
  verb: string,
  message: string,
  payload: ActionPayload = {},
): ActionResult {
  const result: ActionResult = { status: 'success', message, verb, ...payload };
  return Object.freeze(result);
}

export function errorResult(message: string, verb?: string): ActionResult {
  const result: ActionResult =
    verb !== undefined
      ? { status: 'error', message, verb }
      : { status: 'error', message };
  return Object.freeze(result);
}

export function isErrorResult(result: ActionResult): boolean {
  return result.status === 'error';
}

// ── WorkflowRunSummary ────────────────────────────────────────

export const runStatusSchema = z.enum(['passed', 'failed']);

export type RunStatus = z.infer<typeof runStatusSchema>;

export const workflowRunSummarySchema = z.object({
  runId: z.string().min(1),
  workflowId: z.string().min(1),
  status: runStatusSchema,
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  results: z.array(actionResultSchema),
});

export type WorkflowRunSummary = z.infer<typeof workflowRunSummarySchema>;

// ── Deterministic run status ─────────────────────────────────
// Any error result fails the run; an empty run passes.

export function computeRunStatus(results: readonly ActionResult[]): RunStatus {
  return results.some(isErrorResult) ? 'failed' : 'passed';
}

export function parseWorkflowRunSummary(data: unknown): WorkflowRunSummary {
  return workflowRunSummarySchema.parse(data);
}
