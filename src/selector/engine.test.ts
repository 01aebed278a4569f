import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { FakeElement, FakePage } from '../testing/fakePage.js';
import { SelectorEngine } from './engine.js';
import { ElementNotFoundError, InvalidSelectorError, SelectorError } from './errors.js';

describe('selector/engine', () => {
  beforeEach(() => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('findElement', () => {
    it('resolves name:q to the input named q', async () => {
      const input = new FakeElement();
      const page = new FakePage({ elements: { '[name="q"]': [input] } });

      const found = await new SelectorEngine(page).findElement('name:q');

      expect(found).toBe(input);
      expect(page.queries).toEqual(['[name="q"]']);
    });

    it('reports a missing name with the original selector in the message', async () => {
      const page = new FakePage({ elements: { '[name="q"]': [new FakeElement()] } });
      const engine = new SelectorEngine(page);

      const lookup = engine.findElement('name:missing');

      await expect(lookup).rejects.toBeInstanceOf(ElementNotFoundError);
      await expect(lookup).rejects.toMatchObject({
        message: expect.stringContaining('name:missing'),
        selector: 'name:missing',
        query: '[name="missing"]',
      });
    });

    it('returns the first DOM match for css', async () => {
      const first = new FakeElement();
      const second = new FakeElement();
      const page = new FakePage({ elements: { 'ul > li': [first, second] } });

      await expect(new SelectorEngine(page).findElement('ul > li')).resolves.toBe(first);
    });

    it('routes id and class shorthand through their handlers', async () => {
      const byId = new FakeElement();
      const byClass = new FakeElement();
      const page = new FakePage({ elements: { '#login': [byId], '.card': [byClass] } });
      const engine = new SelectorEngine(page);

      await expect(engine.findElement('#login')).resolves.toBe(byId);
      await expect(engine.findElement('class:card')).resolves.toBe(byClass);
    });

    it('queries xpath through the multi-match path and takes the first', async () => {
      const first = new FakeElement();
      const page = new FakePage({
        elements: { "xpath=//a[@rel='next']": [first, new FakeElement()] },
      });

      await expect(new SelectorEngine(page).findElement("xpath://a[@rel='next']")).resolves.toBe(first);
      expect(page.queries).toEqual(["xpath=//a[@rel='next']"]);
    });

    it('rejects invalid selectors before querying the page', async () => {
      const page = new FakePage();

      await expect(new SelectorEngine(page).findElement('weird:thing')).rejects.toBeInstanceOf(
        InvalidSelectorError,
      );
      expect(page.queries).toEqual([]);
    });

    it('wraps unexpected page failures as SelectorError with the cause', async () => {
      const boom = new Error('Target closed');
      const page = new FakePage({ queryError: boom });

      const err: unknown = await new SelectorEngine(page)
        .findElement('#login')
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(SelectorError);
      expect(err).not.toBeInstanceOf(ElementNotFoundError);
      expect(err).toMatchObject({
        selector: '#login',
        cause: boom,
        message: 'Lookup failed for selector "#login": Target closed',
      });
    });
  });

  describe('findElements', () => {
    it('returns every match in order', async () => {
      const a = new FakeElement();
      const b = new FakeElement();
      const page = new FakePage({ elements: { '.item': [a, b] } });

      await expect(new SelectorEngine(page).findElements('.item')).resolves.toEqual([a, b]);
    });

    it('never resolves an empty list', async () => {
      const page = new FakePage();
      const engine = new SelectorEngine(page);

      await expect(engine.findElements('.item')).rejects.toBeInstanceOf(ElementNotFoundError);
      await expect(engine.findElements("xpath://li[@id='x']")).rejects.toBeInstanceOf(
        ElementNotFoundError,
      );
    });
  });
});
