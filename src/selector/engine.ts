import type { ElementRef, PageCapability } from '../browser/page.js';
import type { SelectorSpec } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { ElementNotFoundError, SelectorError } from './errors.js';
import { createSelectorHandlers } from './handlers.js';
import type { SelectorHandler, SelectorHandlerTable } from './handlers.js';
import { parseSelector } from './parse.js';

// ── Engine ────────────────────────────────────────────────────

/**
 * Resolves selector strings against one page.
 *
 * Errors leave this class in exactly three shapes:
 *   - InvalidSelectorError  the string itself is unusable
 *   - ElementNotFoundError  zero matches, message carries the
 *                           caller's selector verbatim
 *   - SelectorError         anything the page threw, as `cause`
 */
export class SelectorEngine {
  private readonly handlers: SelectorHandlerTable;

  constructor(page: PageCapability) {
    this.handlers = createSelectorHandlers(page);
  }

  parse(selector: string | null | undefined): SelectorSpec {
    return parseSelector(selector);
  }

  async findElement(selector: string | null | undefined): Promise<ElementRef> {
    return this.lookup(selector, 'element', (handler, value) => handler.findElement(value));
  }

  async findElements(selector: string | null | undefined): Promise<ElementRef[]> {
    return this.lookup(selector, 'elements', (handler, value) => handler.findElements(value));
  }

  private async lookup<T>(
    selector: string | null | undefined,
    what: string,
    run: (handler: SelectorHandler, value: string) => Promise<T>,
  ): Promise<T> {
    const spec = parseSelector(selector);
    const source = selector ?? '';
    const handler = this.handlers[spec.type];

    log.debug(`Looking up ${what} via ${spec.type} selector: ${spec.value}`);

    try {
      return await run(handler, spec.value);
    } catch (err) {
      if (err instanceof ElementNotFoundError) {
        log.warn(`No match for selector ${source}`);
        throw new ElementNotFoundError(source, err.query);
      }
      if (err instanceof SelectorError) {
        throw err;
      }
      const reason = err instanceof Error ? err.message : String(err);
      log.error(`Lookup failed for selector ${source}: ${reason}`);
      throw new SelectorError(source, `Lookup failed for selector "${source}": ${reason}`, {
        cause: err,
      });
    }
  }
}
