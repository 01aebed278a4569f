import { describe, it, expect } from 'vitest';

import { errorResult, successResult } from '../schema/index.js';
import type { WorkflowRunSummary } from '../schema/index.js';
import { jsonOutputSchema } from '../schema/jsonOutput.js';
import { exitCodeFor, generateJSON, generateMarkdown, serializeJSON } from './reporter.js';

function summary(overrides: Partial<WorkflowRunSummary> = {}): WorkflowRunSummary {
  return {
    runId: 'run-1',
    workflowId: 'search',
    status: 'failed',
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:01.500Z',
    durationMs: 1500,
    results: [
      successResult('goto', 'Navigated to https://shop.test/', { url: 'https://shop.test/' }),
      errorResult('Element not found: #buy|now', 'click'),
    ],
    ...overrides,
  };
}

describe('report/reporter', () => {
  describe('generateJSON', () => {
    it('produces a contract-valid document', () => {
      const output = generateJSON(summary(), 1);

      expect(jsonOutputSchema.safeParse(output).success).toBe(true);
      expect(output.exitCode).toBe(1);
      expect(output.steps).toEqual([
        {
          index: 0,
          verb: 'goto',
          status: 'success',
          message: 'Navigated to https://shop.test/',
          data: { url: 'https://shop.test/' },
        },
        {
          index: 1,
          verb: 'click',
          status: 'error',
          message: 'Element not found: #buy|now',
          data: {},
        },
      ]);
    });

    it('uses an empty verb for results without one', () => {
      const output = generateJSON(summary({ results: [errorResult('Workflow aborted: x')] }), 1);

      expect(output.steps[0]?.verb).toBe('');
    });
  });

  describe('serializeJSON', () => {
    it('sorts object keys', () => {
      const text = serializeJSON(generateJSON(summary({ results: [] }), 1));

      expect(Object.keys(JSON.parse(text))).toEqual([
        'durationMs',
        'exitCode',
        'runId',
        'status',
        'steps',
        'version',
        'workflowId',
      ]);
    });
  });

  describe('exitCodeFor', () => {
    it('maps passed to 0 and failed to 1', () => {
      expect(exitCodeFor('passed')).toBe(0);
      expect(exitCodeFor('failed')).toBe(1);
    });
  });

  describe('generateMarkdown', () => {
    it('renders metadata, steps and extracted data', () => {
      const lines = generateMarkdown(summary()).split('\n');

      expect(lines[0]).toBe('# stealthflow Run Report');
      expect(lines).toContain('| **Duration** | 1.5s |');
      expect(lines).toContain('| **Result** | **FAILED** [FAIL] |');
      expect(lines).toContain('| 0 | goto | success | Navigated to https://shop.test/ |');
      expect(lines).toContain('| 1 | click | error | Element not found: #buy\\|now |');
      expect(lines).toContain('### Step 0');
      expect(lines).not.toContain('### Step 1');
    });

    it('notes an empty run', () => {
      const text = generateMarkdown(summary({ status: 'passed', results: [], durationMs: 12 }));

      expect(text).toContain('| **Duration** | 12ms |');
      expect(text.endsWith('_No steps were executed._\n')).toBe(true);
    });
  });
});
