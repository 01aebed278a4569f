/**
 * Stealth module.
 * Identity rotation and request pacing, plus the store they persist to.
 */

export { AntiCrawlerPolicy, defaultIdentityPool, defaultDelayPolicy } from './policy.js';
export type {
  AntiCrawlerPolicyOptions,
  PersistResult,
  PolicyClock,
  PolicySnapshot,
} from './policy.js';
export { createFileConfigStore } from './store.js';
export type { ConfigStore } from './store.js';
