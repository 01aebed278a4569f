/**
 * Selector module.
 * Parses the selector grammar and resolves it against a page.
 */

export { SelectorEngine } from './engine.js';
export { parseSelector, isValidCssSelector, isValidXPathSelector, NORMALIZERS } from './parse.js';
export { createSelectorHandlers } from './handlers.js';
export type { SelectorHandler, SelectorHandlerTable } from './handlers.js';
export { SelectorError, InvalidSelectorError, ElementNotFoundError } from './errors.js';
