import { describe, it, expect } from 'vitest';

import { parseActionRecord, toActionDescriptor } from './action.js';
import { computeRunStatus, errorResult, successResult } from './results.js';

describe('schema/action', () => {
  it('maps optional record fields onto a frozen descriptor', () => {
    const descriptor = toActionDescriptor({
      verb: 'extract_multiple',
      selector: '.row',
      extractType: 'attribute',
      attribute: 'href',
    });

    expect(descriptor).toEqual({
      verb: 'extract_multiple',
      selector: '.row',
      value: null,
      extras: { extractType: 'attribute', attribute: 'href' },
    });
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.extras)).toBe(true);
  });

  it('reads the snake-case extract_type spelling', () => {
    const descriptor = parseActionRecord({
      verb: 'extract_multiple',
      selector: '.item',
      extract_type: 'html',
    });

    expect(descriptor.extras).toEqual({ extractType: 'html' });
  });

  it('prefers extractType when both spellings are present', () => {
    const descriptor = parseActionRecord({
      verb: 'extract_multiple',
      selector: '.item',
      extractType: 'attribute',
      extract_type: 'html',
    });

    expect(descriptor.extras['extractType']).toBe('attribute');
  });

  it('keeps unknown verbs for the executor to reject', () => {
    expect(parseActionRecord({ verb: 'hover', selector: null }).verb).toBe('hover');
  });

  it('rejects records without a verb', () => {
    expect(() => parseActionRecord({ selector: '#a' })).toThrow();
  });
});

describe('schema/results', () => {
  it('fails a run with any error result and passes an empty run', () => {
    expect(computeRunStatus([])).toBe('passed');
    expect(computeRunStatus([successResult('click', 'Clicked #a')])).toBe('passed');
    expect(
      computeRunStatus([successResult('click', 'Clicked #a'), errorResult('boom', 'click')]),
    ).toBe('failed');
  });
});
