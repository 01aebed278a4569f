import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import type { WorkflowDefinition, WorkflowStepRecord } from '../schema/index.js';
import { AntiCrawlerPolicy } from '../stealth/policy.js';
import { FakeElement, FakePage, FakeProvider } from '../testing/fakePage.js';
import { ActionExecutor } from './executor.js';
import { createWorkflowStore } from './store.js';
import { WorkflowEngine, orderSteps } from './workflow.js';

const search: WorkflowDefinition = {
  id: 'search',
  name: 'Product search',
  steps: [
    { stepOrder: 2, verb: 'input', selector: 'name:q', value: 'desk' },
    { stepOrder: 1, verb: 'goto', value: 'https://shop.test/' },
    { stepOrder: 3, verb: 'extract_url' },
  ],
};

const broken: WorkflowDefinition = {
  id: 'broken',
  steps: [
    { stepOrder: 1, verb: 'click', selector: '#missing' },
    { stepOrder: 2, verb: 'extract_url' },
  ],
};

function createEngine(provider: FakeProvider): WorkflowEngine {
  const executor = new ActionExecutor({
    pages: provider,
    policy: new AntiCrawlerPolicy({ pool: { userAgents: ['agent-test'], proxies: [] } }),
    antiCrawlerEnabled: false,
  });
  return new WorkflowEngine(createWorkflowStore([search, broken]), executor);
}

describe('core/workflow', () => {
  beforeEach(() => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('orderSteps', () => {
    it('sorts by stepOrder and keeps load order for ties', () => {
      const records: WorkflowStepRecord[] = [
        { stepOrder: 2, verb: 'click', selector: '#b' },
        { stepOrder: 1, verb: 'click', selector: '#a1' },
        { stepOrder: 1, verb: 'click', selector: '#a2' },
      ];

      expect(orderSteps(records).map((r) => r.selector)).toEqual(['#a1', '#a2', '#b']);
      expect(records[0]?.selector).toBe('#b');
    });
  });

  describe('WorkflowEngine', () => {
    it('loads steps as ordered descriptors', async () => {
      const descriptors = await createEngine(new FakeProvider()).loadWorkflow('search');

      expect(descriptors.map((d) => d.verb)).toEqual(['goto', 'input', 'extract_url']);
      expect(descriptors[1]).toEqual({
        verb: 'input',
        selector: 'name:q',
        value: 'desk',
        extras: {},
      });
    });

    it('executes a stored workflow in step order', async () => {
      const q = new FakeElement();
      const provider = new FakeProvider(new FakePage({ elements: { '[name="q"]': [q] } }));

      const results = await createEngine(provider).execute('search');

      expect(results.map((r) => r.status)).toEqual(['success', 'success', 'success']);
      expect(results[2]?.url).toBe('https://shop.test/');
      expect(q.calls).toEqual([{ op: 'fill', arg: 'desk' }]);
    });

    it('returns a single error result for an unknown workflow', async () => {
      const provider = new FakeProvider();

      const results = await createEngine(provider).execute('nope');

      expect(results).toEqual([
        { status: 'error', message: 'Cannot load workflow nope: Workflow not found: nope' },
      ]);
      expect(provider.acquired).toBe(0);
    });

    it('summarizes a passing run', async () => {
      const provider = new FakeProvider(
        new FakePage({ elements: { '[name="q"]': [new FakeElement()] } }),
      );

      const summary = await createEngine(provider).run('search');

      expect(summary.workflowId).toBe('search');
      expect(summary.status).toBe('passed');
      expect(summary.results).toHaveLength(3);
      expect(summary.durationMs).toBeGreaterThanOrEqual(0);
      expect(summary.runId).toMatch(/^[0-9a-f-]{36}$/);
      expect(Date.parse(summary.finishedAt)).toBeGreaterThanOrEqual(Date.parse(summary.startedAt));
    });

    it('summarizes a failing run and stops at the failure', async () => {
      const summary = await createEngine(new FakeProvider()).run('broken');

      expect(summary.status).toBe('failed');
      expect(summary.results).toHaveLength(1);
      expect(summary.results[0]?.verb).toBe('click');
    });
  });
});
