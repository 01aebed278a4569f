// ── Selector error taxonomy ───────────────────────────────────
//
//   SelectorError            unexpected failure during a lookup
//   ├── InvalidSelectorError malformed, empty or unsupported input
//   └── ElementNotFoundError the lookup matched nothing

export class SelectorError extends Error {
  readonly selector: string;

  constructor(selector: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SelectorError';
    this.selector = selector;
  }
}

export class InvalidSelectorError extends SelectorError {
  readonly reason: string;

  constructor(selector: string, reason: string) {
    super(selector, `Invalid selector "${selector}": ${reason}`);
    this.name = 'InvalidSelectorError';
    this.reason = reason;
  }
}

export class ElementNotFoundError extends SelectorError {
  /** The normalized query actually sent to the page. */
  readonly query: string;

  constructor(selector: string, query: string = selector) {
    super(
      selector,
      query === selector
        ? `Element not found: ${selector}`
        : `Element not found: ${selector} (queried as ${query})`,
    );
    this.name = 'ElementNotFoundError';
    this.query = query;
  }
}
