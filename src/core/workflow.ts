import { randomUUID } from 'node:crypto';

import { computeRunStatus, errorResult, toActionDescriptor } from '../schema/index.js';
import type {
  ActionDescriptor,
  ActionResult,
  WorkflowRunSummary,
  WorkflowStepRecord,
} from '../schema/index.js';
import * as log from '../utils/logger.js';
import type { ActionExecutor } from './executor.js';
import type { WorkflowStore } from './store.js';

// ── Ordering ─────────────────────────────────────────────────

/** Stable sort by `stepOrder`; equal orders keep their load order. */
export function orderSteps(
  records: readonly WorkflowStepRecord[],
): WorkflowStepRecord[] {
  return [...records].sort((a, b) => a.stepOrder - b.stepOrder);
}

// ── Engine ───────────────────────────────────────────────────

/**
 * Materializes a stored workflow into descriptors and hands them to
 * the executor. Adds ordering and nothing else: fail-fast, pacing
 * and page release all belong to the executor.
 */
export class WorkflowEngine {
  private readonly store: WorkflowStore;
  private readonly executor: ActionExecutor;

  constructor(store: WorkflowStore, executor: ActionExecutor) {
    this.store = store;
    this.executor = executor;
  }

  async loadWorkflow(workflowId: string): Promise<ActionDescriptor[]> {
    const records = await this.store.loadSteps(workflowId);
    return orderSteps(records).map(toActionDescriptor);
  }

  /** Execute a stored workflow. Never rejects. */
  async execute(workflowId: string): Promise<ActionResult[]> {
    let descriptors: ActionDescriptor[];
    try {
      descriptors = await this.loadWorkflow(workflowId);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Cannot load workflow ${workflowId}: ${message}`);
      return [errorResult(`Cannot load workflow ${workflowId}: ${message}`)];
    }

    log.info(`Workflow ${workflowId}: ${String(descriptors.length)} steps`);
    return this.executor.executeWorkflow(descriptors);
  }

  async run(workflowId: string): Promise<WorkflowRunSummary> {
    const startedAt = new Date();
    const results = await this.execute(workflowId);
    const finishedAt = new Date();

    return {
      runId: randomUUID(),
      workflowId,
      status: computeRunStatus(results),
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
      results: [...results],
    };
  }
}
