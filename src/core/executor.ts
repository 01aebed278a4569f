import type { ElementRef, PageCapability, PageProvider, PageSession } from '../browser/page.js';
import {
  UNTARGETED_VERBS,
  actionVerbSchema,
  errorResult,
  extractTypeSchema,
  successResult,
} from '../schema/index.js';
import type { ActionDescriptor, ActionResult, ActionVerb } from '../schema/index.js';
import { SelectorEngine, SelectorError } from '../selector/index.js';
import type { AntiCrawlerPolicy } from '../stealth/policy.js';
import * as log from '../utils/logger.js';
import { ActionError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface ActionExecutorOptions {
  pages: PageProvider;
  policy: AntiCrawlerPolicy;
  /** Pace every action and rotate identities. Defaults to true. */
  antiCrawlerEnabled?: boolean | undefined;
}

const DEFAULT_ATTRIBUTE = 'value';

// ── Executor ─────────────────────────────────────────────────

/**
 * Runs action descriptors against a page. `executeAction` is the
 * single place where failures turn into error results: nothing it
 * catches is rethrown.
 */
export class ActionExecutor {
  private readonly pages: PageProvider;
  private readonly policy: AntiCrawlerPolicy;
  private readonly antiCrawlerEnabled: boolean;

  constructor(options: ActionExecutorOptions) {
    this.pages = options.pages;
    this.policy = options.policy;
    this.antiCrawlerEnabled = options.antiCrawlerEnabled ?? true;
  }

  async executeAction(
    descriptor: ActionDescriptor,
    session?: PageSession,
  ): Promise<ActionResult> {
    let owned: PageSession | null = null;
    let result: ActionResult;

    try {
      if (this.antiCrawlerEnabled) {
        await this.policy.gate();
      }

      let active = session;
      if (active === undefined) {
        owned = await this.acquire();
        active = owned;
      }

      result = await performAction(active.page, descriptor);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Action ${descriptor.verb} failed: ${message}`);
      result = errorResult(message, descriptor.verb);
    }

    // A failed release outranks a success; an earlier error keeps its message.
    if (owned !== null) {
      const releaseError = await releaseSession(owned);
      if (releaseError !== null && result.status === 'success') {
        return errorResult(`Failed to release page: ${releaseError}`, descriptor.verb);
      }
    }
    return result;
  }

  /**
   * Run descriptors in order on one session, stopping after the
   * first error result. The session is released exactly once.
   */
  async executeWorkflow(
    descriptors: readonly ActionDescriptor[],
  ): Promise<ActionResult[]> {
    const results: ActionResult[] = [];
    if (descriptors.length === 0) return results;

    const total = descriptors.length;
    let session: PageSession | null = null;

    try {
      session = await this.acquire();

      for (const [index, descriptor] of descriptors.entries()) {
        const label = describeAction(descriptor);
        log.step(index, total, label);

        const result = await this.executeAction(descriptor, session);
        results.push(result);

        const ok = result.status === 'success';
        log.stepResult(index, total, ok, ok ? label : `${label}: ${result.message}`);
        if (!ok) break;
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Workflow aborted: ${message}`);
      results.push(errorResult(`Workflow aborted: ${message}`));
    } finally {
      if (session !== null) {
        const releaseError = await releaseSession(session);
        if (releaseError !== null) {
          results.push(errorResult(`Failed to release page: ${releaseError}`));
        }
      }
    }

    return results;
  }

  private async acquire(): Promise<PageSession> {
    const identity = this.antiCrawlerEnabled ? this.policy.getRandomIdentity() : null;
    return this.pages.newPage(identity);
  }
}

/** Close a session; resolves with the failure message, or null. */
async function releaseSession(session: PageSession): Promise<string | null> {
  try {
    await session.close();
    return null;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Failed to release page: ${message}`);
    return message;
  }
}

// ── Description helper ───────────────────────────────────────

/** Human-readable one-liner describing the action for logs. */
export function describeAction(descriptor: ActionDescriptor): string {
  const parts = [descriptor.verb];
  if (descriptor.selector !== null) parts.push(descriptor.selector);
  if (descriptor.value !== null) parts.push(`"${descriptor.value}"`);
  return parts.join(' ');
}

// ── Action dispatch ──────────────────────────────────────────

async function performAction(
  page: PageCapability,
  descriptor: ActionDescriptor,
): Promise<ActionResult> {
  const parsed = actionVerbSchema.safeParse(descriptor.verb);
  if (!parsed.success) {
    throw new ActionError(descriptor.verb, `Unsupported action verb: ${descriptor.verb}`);
  }
  const verb = parsed.data;

  if (UNTARGETED_VERBS.has(verb)) {
    return performPageAction(page, verb, descriptor);
  }

  const selector = requireSelector(verb, descriptor);
  const engine = new SelectorEngine(page);

  if (verb === 'extract_multiple') {
    const elements = await engine.findElements(selector);
    return extractMultiple(elements, selector, descriptor);
  }

  const target = await engine.findElement(selector);
  return performElementAction(target, verb, selector, descriptor);
}

async function performPageAction(
  page: PageCapability,
  verb: ActionVerb,
  descriptor: ActionDescriptor,
): Promise<ActionResult> {
  switch (verb) {
    case 'goto': {
      const url = requireValue(verb, descriptor);
      await primitive(verb, url, () => page.navigate(url));
      return successResult(verb, `Navigated to ${url}`, { url: page.currentUrl() });
    }

    case 'extract_url': {
      const url = page.currentUrl();
      return successResult(verb, `Current URL is ${url}`, { url });
    }

    default:
      throw new ActionError(verb, `Action ${verb} requires a selector`);
  }
}

async function performElementAction(
  target: ElementRef,
  verb: ActionVerb,
  selector: string,
  descriptor: ActionDescriptor,
): Promise<ActionResult> {
  switch (verb) {
    case 'click':
      await primitive(verb, selector, () => target.click());
      return successResult(verb, `Clicked ${selector}`);

    case 'input': {
      const value = requireValue(verb, descriptor);
      await primitive(verb, selector, () => target.fill(value));
      return successResult(verb, `Filled ${selector}`);
    }

    case 'select': {
      const value = requireValue(verb, descriptor);
      await primitive(verb, selector, () => target.selectOption(value));
      return successResult(verb, `Selected "${value}" in ${selector}`);
    }

    case 'radio':
    case 'checkbox':
      await primitive(verb, selector, () => target.check());
      return successResult(verb, `Checked ${verb} ${selector}`);

    case 'wait':
      await primitive(verb, selector, () => target.waitVisible());
      return successResult(verb, `${selector} is visible`);

    case 'extract_text': {
      const text = await primitive(verb, selector, () => target.textContent());
      return successResult(verb, `Extracted text from ${selector}`, { text });
    }

    case 'extract_html': {
      const html = await primitive(verb, selector, () => target.innerHtml());
      return successResult(verb, `Extracted HTML from ${selector}`, { html });
    }

    case 'extract_attribute': {
      const name = descriptor.extras['attribute'] ?? DEFAULT_ATTRIBUTE;
      const attribute = await primitive(verb, selector, () => target.getAttribute(name));
      return successResult(verb, `Extracted attribute "${name}" from ${selector}`, {
        attribute,
      });
    }

    case 'goto':
    case 'extract_url':
    case 'extract_multiple':
      throw new ActionError(verb, `Action ${verb} does not take a single target`);
  }
}

async function extractMultiple(
  elements: readonly ElementRef[],
  selector: string,
  descriptor: ActionDescriptor,
): Promise<ActionResult> {
  const verb = 'extract_multiple';
  const rawType = descriptor.extras['extractType'] ?? 'text';
  const parsed = extractTypeSchema.safeParse(rawType);
  if (!parsed.success) {
    throw new ActionError(verb, `Unknown extract type: ${rawType}`);
  }
  const extractType = parsed.data;
  const attribute = descriptor.extras['attribute'] ?? DEFAULT_ATTRIBUTE;

  const list: (string | null)[] = [];
  for (const element of elements) {
    switch (extractType) {
      case 'text':
        list.push(await primitive(verb, selector, () => element.textContent()));
        break;
      case 'html':
        list.push(await primitive(verb, selector, () => element.innerHtml()));
        break;
      case 'attribute':
        list.push(await primitive(verb, selector, () => element.getAttribute(attribute)));
        break;
    }
  }

  return successResult(
    verb,
    `Extracted ${extractType} from ${String(list.length)} elements matching ${selector}`,
    { list },
  );
}

// ── Argument guards ──────────────────────────────────────────

function requireSelector(verb: ActionVerb, descriptor: ActionDescriptor): string {
  if (descriptor.selector === null) {
    throw new ActionError(verb, `Action ${verb} requires a selector`);
  }
  return descriptor.selector;
}

function requireValue(verb: ActionVerb, descriptor: ActionDescriptor): string {
  if (descriptor.value === null) {
    throw new ActionError(verb, `Action ${verb} requires a value`);
  }
  return descriptor.value;
}

/** Run a page primitive, reporting its failure as an ActionError. */
async function primitive<T>(
  verb: ActionVerb,
  target: string,
  run: () => Promise<T>,
): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (err instanceof ActionError || err instanceof SelectorError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new ActionError(verb, `${verb} on ${target} failed: ${reason}`, { cause: err });
  }
}
