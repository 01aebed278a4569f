import type { WorkflowDefinition, WorkflowStepRecord } from '../schema/index.js';
import { WorkflowNotFoundError } from './errors.js';

// ── Collaborator contract ────────────────────────────────────

export interface WorkflowListing {
  id: string;
  name: string;
  stepCount: number;
}

export interface WorkflowStore {
  /** Step records as stored; ordering is the engine's job. */
  loadSteps(workflowId: string): Promise<WorkflowStepRecord[]>;
  listWorkflows(): Promise<WorkflowListing[]>;
}

// ── Config-file store ────────────────────────────────────────

/**
 * Serves workflows declared in the `workflows:` block of the config
 * file. The definitions are already zod-validated by the loader.
 */
export function createWorkflowStore(
  workflows: readonly WorkflowDefinition[],
): WorkflowStore {
  const byId = new Map(workflows.map((w) => [w.id, w]));

  return {
    async loadSteps(workflowId: string): Promise<WorkflowStepRecord[]> {
      const workflow = byId.get(workflowId);
      if (workflow === undefined) {
        throw new WorkflowNotFoundError(workflowId);
      }
      return workflow.steps.map((step) => ({ ...step }));
    },

    async listWorkflows(): Promise<WorkflowListing[]> {
      return workflows.map((w) => ({
        id: w.id,
        name: w.name ?? w.id,
        stepCount: w.steps.length,
      }));
    },
  };
}
