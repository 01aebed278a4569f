import { chromium, firefox, webkit } from 'playwright';
import type { Browser, BrowserType, ElementHandle, LaunchOptions, Page } from 'playwright';

import type { BrowserKind, IdentityProfile, ProxyConfig, Viewport } from '../schema/index.js';
import { PROXY_DEFAULTS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import type { ElementRef, PageCapability, PageProvider, PageSession } from './page.js';

// ── Public types ─────────────────────────────────────────────

export interface PlaywrightProviderConfig {
  browser: BrowserKind;
  headless: boolean;
  viewport?: Viewport | undefined;
  /** When false, identities are bound without their proxy. */
  proxyEnabled: boolean;
  navigationTimeout?: number | undefined;
  actionTimeout?: number | undefined;
}

// ── Browser selection ────────────────────────────────────────

function browserTypeFor(kind: BrowserKind): BrowserType {
  switch (kind) {
    case 'chromium':
      return chromium;
    case 'firefox':
      return firefox;
    case 'webkit':
      return webkit;
  }
}

function toLaunchProxy(proxy: ProxyConfig): NonNullable<LaunchOptions['proxy']> {
  return proxy.bypass !== null
    ? { server: proxy.server, bypass: proxy.bypass }
    : { server: proxy.server };
}

// ── Provider ─────────────────────────────────────────────────

/**
 * Page provider backed by a real browser. Each session launches its
 * own browser so a run never shares a page, cookies or proxy with
 * another run; `close()` tears the whole browser down.
 */
export function createPlaywrightProvider(
  config: PlaywrightProviderConfig,
): PageProvider {
  const navigationTimeout = config.navigationTimeout ?? TIMEOUTS.NAVIGATION_TIMEOUT;
  const actionTimeout = config.actionTimeout ?? TIMEOUTS.ACTION_TIMEOUT;

  return {
    async newPage(identity: IdentityProfile | null): Promise<PageSession> {
      const proxy = config.proxyEnabled ? identity?.proxy ?? null : null;

      const launchOptions: LaunchOptions = { headless: config.headless };
      if (proxy !== null) {
        launchOptions.proxy = toLaunchProxy(proxy);
      }

      const browser = await browserTypeFor(config.browser).launch(launchOptions);
      try {
        const context = await browser.newContext({
          ...(identity !== null ? { userAgent: identity.userAgent } : {}),
          ...(config.viewport !== undefined ? { viewport: config.viewport } : {}),
        });
        const page = await context.newPage();

        if (identity !== null) {
          log.identity(identity.userAgent, proxy?.server ?? null);
        }

        return createSession(browser, page, identity, navigationTimeout, actionTimeout);
      } catch (err) {
        await browser.close();
        throw err;
      }
    },
  };
}

function createSession(
  browser: Browser,
  page: Page,
  identity: IdentityProfile | null,
  navigationTimeout: number,
  actionTimeout: number,
): PageSession {
  const capability: PageCapability = {
    async navigate(url: string): Promise<void> {
      await page.goto(url, {
        timeout: navigationTimeout,
        waitUntil: 'domcontentloaded',
      });
    },

    async queryOne(selector: string): Promise<ElementRef | null> {
      const handle = await page.$(selector);
      return handle !== null ? wrapHandle(handle, actionTimeout) : null;
    },

    async queryAll(selector: string): Promise<ElementRef[]> {
      const handles = await page.$$(selector);
      return handles.map((h) => wrapHandle(h, actionTimeout));
    },

    currentUrl(): string {
      return page.url();
    },
  };

  return {
    page: capability,
    identity,
    async close(): Promise<void> {
      await browser.close();
    },
  };
}

// ── Element adapter ──────────────────────────────────────────

function wrapHandle(handle: ElementHandle, timeout: number): ElementRef {
  return {
    async click(): Promise<void> {
      await handle.click({ timeout });
    },
    async fill(value: string): Promise<void> {
      await handle.fill(value, { timeout });
    },
    async selectOption(value: string): Promise<void> {
      await handle.selectOption(value, { timeout });
    },
    async check(): Promise<void> {
      await handle.check({ timeout });
    },
    async waitVisible(): Promise<void> {
      await handle.waitForElementState('visible', { timeout });
    },
    textContent(): Promise<string | null> {
      return handle.textContent();
    },
    innerHtml(): Promise<string> {
      return handle.innerHTML();
    },
    getAttribute(name: string): Promise<string | null> {
      return handle.getAttribute(name);
    },
  };
}

// ── Proxy check ──────────────────────────────────────────────

/**
 * Launch a throwaway browser through `proxy` and load a probe URL.
 * Resolves false when the proxy cannot serve the page in time.
 */
export async function checkProxy(
  proxy: ProxyConfig,
  options: { url?: string; timeout?: number } = {},
): Promise<boolean> {
  const url = options.url ?? PROXY_DEFAULTS.CHECK_URL;
  const timeout = options.timeout ?? TIMEOUTS.PROXY_CHECK_TIMEOUT;

  const browser = await chromium.launch({ headless: true, proxy: toLaunchProxy(proxy) });
  try {
    const page = await browser.newPage();
    await page.goto(url, { timeout });
    return true;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.detail(`Proxy ${proxy.server} failed: ${message}`);
    return false;
  } finally {
    await browser.close();
  }
}
