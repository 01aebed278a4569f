/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated.
 */

export {
  TIMEOUTS,
  DELAY_DEFAULTS,
  PROXY_DEFAULTS,
  PATHS,
  DEFAULT_USER_AGENTS,
} from './defaults.js';
export { loadConfigFile, parseConfigText, formatZodError, ConfigError } from './loader.js';
