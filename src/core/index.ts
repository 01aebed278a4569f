/**
 * Core module.
 * Action execution and workflow sequencing.
 * Consumes the page provider and the anti-crawler policy.
 */

export { ActionExecutor, describeAction } from './executor.js';
export type { ActionExecutorOptions } from './executor.js';
export { WorkflowEngine, orderSteps } from './workflow.js';
export { createWorkflowStore } from './store.js';
export type { WorkflowStore, WorkflowListing } from './store.js';
export { ActionError, WorkflowNotFoundError } from './errors.js';
