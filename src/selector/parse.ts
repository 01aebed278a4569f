import type { SelectorSpec, SelectorType } from '../schema/index.js';
import { InvalidSelectorError } from './errors.js';

// ── Normalization ─────────────────────────────────────────────
// One rule per selector type; each is idempotent so handlers can
// re-apply it to values that are already normalized.

const NAME_ATTRIBUTE = /^\[name="((?:[^"\\]|\\.)*)"\]$/;

function escapeAttributeValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export const NORMALIZERS: { readonly [K in SelectorType]: (value: string) => string } = {
  css: (value) => value,
  xpath: (value) => value,
  id: (value) => (value.startsWith('#') ? value : `#${value}`),
  name: (value) =>
    NAME_ATTRIBUTE.test(value) ? value : `[name="${escapeAttributeValue(value)}"]`,
  class: (value) => (value.startsWith('.') ? value : `.${value}`),
};

// ── Syntax checks ─────────────────────────────────────────────

const CSS_MARKERS = ['#', '.', '[', ']', ':', '>'];
const XPATH_MARKERS = ['@', '=', '[', ']'];

function count(text: string, char: string): number {
  return text.split(char).length - 1;
}

function bracketsBalanced(text: string): boolean {
  return count(text, '[') === count(text, ']');
}

export function isValidCssSelector(value: string): boolean {
  return CSS_MARKERS.some((m) => value.includes(m)) && bracketsBalanced(value);
}

export function isValidXPathSelector(value: string): boolean {
  return (
    (value.startsWith('//') || value.startsWith('(')) &&
    XPATH_MARKERS.some((m) => value.includes(m)) &&
    bracketsBalanced(value)
  );
}

// ── Prefixes ──────────────────────────────────────────────────

const PREFIXES: ReadonlyArray<readonly [string, SelectorType]> = [
  ['css:', 'css'],
  ['xpath:', 'xpath'],
  ['id:', 'id'],
  ['name:', 'name'],
  ['class:', 'class'],
];

function spec(type: SelectorType, value: string): SelectorSpec {
  return { type, value: NORMALIZERS[type](value) };
}

// ── Parser ────────────────────────────────────────────────────

/**
 * Turn a selector string into a typed, normalized SelectorSpec.
 *
 * Order of precedence:
 *   1. explicit prefix  (css: xpath: id: name: class:)
 *   2. shorthand        ([name="…"], #id, .class)
 *   3. any other colon  → rejected as an unsupported type
 *   4. bare             → css
 *
 * Step 3 is deliberately strict: `a:hover` or `foo:bar` are refused
 * rather than guessed at. Use the `css:` prefix for pseudo-classes.
 */
export function parseSelector(selector: string | null | undefined): SelectorSpec {
  if (selector === null || selector === undefined || selector === '') {
    throw new InvalidSelectorError(String(selector ?? ''), 'selector must be a non-empty string');
  }

  for (const [prefix, type] of PREFIXES) {
    if (!selector.startsWith(prefix)) continue;

    const value = selector.slice(prefix.length);
    if (value === '') {
      throw new InvalidSelectorError(selector, 'selector value is empty');
    }
    if (type === 'css' && !isValidCssSelector(value)) {
      throw new InvalidSelectorError(selector, 'malformed CSS selector');
    }
    if (type === 'xpath' && !isValidXPathSelector(value)) {
      throw new InvalidSelectorError(selector, 'malformed XPath selector');
    }
    return spec(type, value);
  }

  const nameMatch = NAME_ATTRIBUTE.exec(selector);
  if (nameMatch) {
    if (nameMatch[1] === '') {
      throw new InvalidSelectorError(selector, 'selector value is empty');
    }
    return spec('name', selector);
  }

  if (selector.startsWith('#') || selector.startsWith('.')) {
    if (selector.length === 1) {
      throw new InvalidSelectorError(selector, 'selector value is empty');
    }
    return spec(selector.startsWith('#') ? 'id' : 'class', selector);
  }

  if (selector.includes(':')) {
    throw new InvalidSelectorError(selector, 'unsupported selector type');
  }

  return spec('css', selector);
}
