/**
 * Default configuration values.
 * Timeouts and the store directory are overridable via the config
 * file; the identity and delay defaults apply until a saved pool exists.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 15_000,
  ACTION_TIMEOUT: 8_000,
  PROXY_CHECK_TIMEOUT: 5_000,
} as const;

export const DELAY_DEFAULTS = {
  MIN_DELAY_SECONDS: 1.0,
  MAX_DELAY_SECONDS: 3.0,
  RANDOMIZE: true,
} as const;

export const PROXY_DEFAULTS = {
  BYPASS: 'localhost,127.0.0.1',
  CHECK_URL: 'http://www.google.com',
} as const;

export const PATHS = {
  CONFIG_FILE: '.stealthflow.yaml',
  STORE_DIR: '.stealthflow',
  IDENTITY_FILE: 'identity.yaml',
  DELAY_FILE: 'delay.yaml',
} as const;

export const DEFAULT_USER_AGENTS: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36 Edg/124.0.0.0',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
];
