import type { ActionResult, RunStatus, WorkflowRunSummary } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputStep } from '../schema/jsonOutput.js';

// Contract types travel with the generators.
export type { JsonOutput, JsonOutputStep };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(
  run: WorkflowRunSummary,
  exitCode: number,
): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    status: run.status,
    runId: run.runId,
    workflowId: run.workflowId,
    durationMs: run.durationMs,
    exitCode,
    steps: run.results.map(stepToJSON),
  };
}

function stepToJSON(result: ActionResult, index: number): JsonOutputStep {
  return {
    index,
    verb: result.verb ?? '',
    status: result.status,
    message: result.message,
    data: payloadOf(result),
  };
}

function payloadOf(result: ActionResult): Record<string, unknown> {
  const data: Record<string, unknown> = {};
  if (result.url !== undefined) data['url'] = result.url;
  if (result.text !== undefined) data['text'] = result.text;
  if (result.html !== undefined) data['html'] = result.html;
  if (result.attribute !== undefined) data['attribute'] = result.attribute;
  if (result.list !== undefined) data['list'] = result.list;
  return data;
}

// ── Deterministic serialization ─────────────────────────────
// Object keys are emitted in sorted order at every depth.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

// ── Exit code ────────────────────────────────────────────────

export function exitCodeFor(status: RunStatus): number {
  return status === 'passed' ? 0 : 1;
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: WorkflowRunSummary): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# stealthflow Run Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Workflow** | ${escapeMarkdownCell(run.workflowId)} |`);
  lines.push(`| **Run ID** | \`${run.runId}\` |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  lines.push(`| **Result** | **${run.status.toUpperCase()}** ${statusIcon(run.status)} |`);
  lines.push('');

  // Step table
  lines.push(`## Steps`);
  lines.push('');

  if (run.results.length === 0) {
    lines.push('_No steps were executed._');
    lines.push('');
    return lines.join('\n');
  }

  lines.push(`| # | Verb | Status | Message |`);
  lines.push(`|---|------|--------|---------|`);

  run.results.forEach((result, index) => {
    lines.push(
      `| ${String(index)} | ${escapeMarkdownCell(result.verb ?? '-')} | ${result.status} | ${escapeMarkdownCell(result.message)} |`,
    );
  });
  lines.push('');

  // Extracted data
  const extracted = run.results
    .map((result, index) => ({ index, data: payloadOf(result) }))
    .filter((entry) => Object.keys(entry.data).length > 0);

  if (extracted.length > 0) {
    lines.push(`## Extracted Data`);
    lines.push('');
    for (const entry of extracted) {
      lines.push(`### Step ${String(entry.index)}`);
      lines.push('');
      lines.push('```json');
      lines.push(JSON.stringify(entry.data, null, 2));
      lines.push('```');
      lines.push('');
    }
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function statusIcon(status: RunStatus): string {
  switch (status) {
    case 'passed':
      return '[PASS]';
    case 'failed':
      return '[FAIL]';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
