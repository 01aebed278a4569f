// ── Error ────────────────────────────────────────────────────

/**
 * An action could not run: unknown verb, missing argument, or a
 * page primitive that failed after its target was resolved. Never
 * escapes the executor; it becomes an error ActionResult.
 */
export class ActionError extends Error {
  readonly verb: string;

  constructor(verb: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ActionError';
    this.verb = verb;
  }
}

export class WorkflowNotFoundError extends Error {
  readonly workflowId: string;

  constructor(workflowId: string) {
    super(`Workflow not found: ${workflowId}`);
    this.name = 'WorkflowNotFoundError';
    this.workflowId = workflowId;
  }
}
