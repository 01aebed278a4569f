import type { IdentityProfile } from '../schema/index.js';

// ── Page capability ──────────────────────────────────────────
// The narrow surface the core drives. The Playwright adapter in
// ./playwright.ts implements it; tests use an in-process fake.

export interface ElementRef {
  click(): Promise<void>;
  fill(value: string): Promise<void>;
  selectOption(value: string): Promise<void>;
  check(): Promise<void>;
  waitVisible(): Promise<void>;
  textContent(): Promise<string | null>;
  innerHtml(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
}

export interface PageCapability {
  navigate(url: string): Promise<void>;
  /** First DOM match, or null when nothing matches. */
  queryOne(selector: string): Promise<ElementRef | null>;
  /** Every match in document order. */
  queryAll(selector: string): Promise<ElementRef[]>;
  currentUrl(): string;
}

// ── Sessions ─────────────────────────────────────────────────

/** A page owned exclusively by one run until `close()`. */
export interface PageSession {
  readonly page: PageCapability;
  readonly identity: IdentityProfile | null;
  close(): Promise<void>;
}

export interface PageProvider {
  newPage(identity: IdentityProfile | null): Promise<PageSession>;
}
