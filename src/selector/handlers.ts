import type { ElementRef, PageCapability } from '../browser/page.js';
import type { SelectorType } from '../schema/index.js';
import { ElementNotFoundError, InvalidSelectorError } from './errors.js';
import { NORMALIZERS } from './parse.js';

// ── Handler contract ──────────────────────────────────────────

export interface SelectorHandler {
  readonly type: SelectorType;
  /** First match for `value`; throws ElementNotFoundError on none. */
  findElement(value: string): Promise<ElementRef>;
  /** All matches for `value`; throws ElementNotFoundError on none. */
  findElements(value: string): Promise<ElementRef[]>;
}

export type SelectorHandlerTable = { readonly [K in SelectorType]: SelectorHandler };

// ── DOM-query handlers (css, id, name, class) ─────────────────

function createDomHandler(type: Exclude<SelectorType, 'xpath'>, page: PageCapability): SelectorHandler {
  const normalize = NORMALIZERS[type];

  return {
    type,

    async findElement(value: string): Promise<ElementRef> {
      const query = normalize(value);
      const element = await page.queryOne(query);
      if (element === null) {
        throw new ElementNotFoundError(query);
      }
      return element;
    },

    async findElements(value: string): Promise<ElementRef[]> {
      const query = normalize(value);
      const elements = await page.queryAll(query);
      if (elements.length === 0) {
        throw new ElementNotFoundError(query);
      }
      return elements;
    },
  };
}

// ── XPath handler ─────────────────────────────────────────────
// Queries go through the ordered multi-match path; the single
// lookup takes the first element in document order.

function toXPathQuery(value: string): string {
  if (!value.startsWith('//') && !value.startsWith('(')) {
    throw new InvalidSelectorError(value, "XPath must start with '//' or '('");
  }
  return `xpath=${value}`;
}

function createXPathHandler(page: PageCapability): SelectorHandler {
  async function findAll(value: string): Promise<ElementRef[]> {
    const elements = await page.queryAll(toXPathQuery(value));
    if (elements.length === 0) {
      throw new ElementNotFoundError(value);
    }
    return elements;
  }

  return {
    type: 'xpath',

    async findElement(value: string): Promise<ElementRef> {
      const [first] = await findAll(value);
      if (first === undefined) {
        throw new ElementNotFoundError(value);
      }
      return first;
    },

    findElements: findAll,
  };
}

// ── Table ─────────────────────────────────────────────────────

export function createSelectorHandlers(page: PageCapability): SelectorHandlerTable {
  return {
    css: createDomHandler('css', page),
    xpath: createXPathHandler(page),
    id: createDomHandler('id', page),
    name: createDomHandler('name', page),
    class: createDomHandler('class', page),
  };
}
