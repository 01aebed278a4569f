/**
 * Browser module.
 * The page capability the core drives, and its Playwright adapter.
 */

export type { ElementRef, PageCapability, PageProvider, PageSession } from './page.js';
export { createPlaywrightProvider, checkProxy } from './playwright.js';
export type { PlaywrightProviderConfig } from './playwright.js';
