import { setTimeout as sleepMs } from 'node:timers/promises';

import { DEFAULT_USER_AGENTS, DELAY_DEFAULTS, PROXY_DEFAULTS } from '../config/defaults.js';
import { delayPolicySchema } from '../schema/index.js';
import type { DelayPolicy, IdentityPool, IdentityProfile, ProxyConfig } from '../schema/index.js';
import * as log from '../utils/logger.js';
import type { ConfigStore } from './store.js';

// ── Public types ─────────────────────────────────────────────

export interface PolicyClock {
  /** Milliseconds, monotonic enough for pacing. */
  now(): number;
  /** Resolve after `ms`; must not reject. */
  sleep(ms: number): Promise<void>;
  /** Uniform in [0, 1). */
  random(): number;
}

export interface AntiCrawlerPolicyOptions {
  pool?: IdentityPool | undefined;
  delay?: DelayPolicy | undefined;
  store?: ConfigStore | undefined;
  clock?: Partial<PolicyClock> | undefined;
}

/** Outcome of an administrative change. The in-memory change always stands. */
export type PersistResult =
  | { readonly persisted: true }
  | { readonly persisted: false; readonly error: Error };

export interface PolicySnapshot {
  readonly pool: IdentityPool;
  readonly delay: DelayPolicy;
}

// ── Defaults ─────────────────────────────────────────────────

export function defaultIdentityPool(): IdentityPool {
  return { userAgents: [...DEFAULT_USER_AGENTS], proxies: [] };
}

export function defaultDelayPolicy(): DelayPolicy {
  return {
    minDelaySeconds: DELAY_DEFAULTS.MIN_DELAY_SECONDS,
    maxDelaySeconds: DELAY_DEFAULTS.MAX_DELAY_SECONDS,
    randomize: DELAY_DEFAULTS.RANDOMIZE,
  };
}

const systemClock: PolicyClock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await sleepMs(ms);
  },
  random: () => Math.random(),
};

// ── Policy ───────────────────────────────────────────────────

/**
 * Process-wide pacing and identity rotation.
 *
 * One instance is shared by every executor in the process. Reads
 * (identity draws, gating) take no lock, and administrative writes
 * are not synchronized against them: a run may still draw a profile
 * that another caller is removing. That is accepted.
 */
export class AntiCrawlerPolicy {
  private userAgents: string[];
  private proxies: ProxyConfig[];
  private delay: DelayPolicy;
  private lastRequestAt: number | null = null;
  private readonly store: ConfigStore | undefined;
  private readonly clock: PolicyClock;

  constructor(options: AntiCrawlerPolicyOptions = {}) {
    const pool = options.pool ?? defaultIdentityPool();
    if (pool.userAgents.length === 0) {
      throw new Error('Identity pool needs at least one user-agent');
    }
    this.userAgents = [...pool.userAgents];
    this.proxies = pool.proxies.map((p) => ({ ...p }));
    this.delay = delayPolicySchema.parse(options.delay ?? defaultDelayPolicy());
    this.store = options.store;
    this.clock = { ...systemClock, ...options.clock };
  }

  /** Build a policy from saved state, falling back to built-in defaults. */
  static async load(
    store: ConfigStore,
    clock?: Partial<PolicyClock>,
  ): Promise<AntiCrawlerPolicy> {
    const [pool, delay] = await Promise.all([
      store.loadIdentityPool(),
      store.loadDelayPolicy(),
    ]);
    return new AntiCrawlerPolicy({
      pool: pool ?? undefined,
      delay: delay ?? undefined,
      store,
      clock,
    });
  }

  // ── Identity ───────────────────────────────────────────────

  getRandomIdentity(): IdentityProfile {
    const userAgent = this.pick(this.userAgents);
    if (userAgent === undefined) {
      throw new Error('Identity pool needs at least one user-agent');
    }
    const proxy = this.pick(this.proxies);

    return Object.freeze({
      userAgent,
      proxy: proxy !== undefined ? Object.freeze({ ...proxy }) : null,
    });
  }

  private pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[Math.floor(this.clock.random() * items.length)];
  }

  // ── Pacing ─────────────────────────────────────────────────

  /** Seconds to wait before the next request. */
  computeDelay(): number {
    const { minDelaySeconds, maxDelaySeconds, randomize } = this.delay;
    if (!randomize) return minDelaySeconds;
    return minDelaySeconds + this.clock.random() * (maxDelaySeconds - minDelaySeconds);
  }

  /**
   * True when the previous request is more recent than
   * `minDelaySeconds`. `maxDelaySeconds` only bounds the wait length.
   */
  shouldDelay(): boolean {
    if (this.lastRequestAt === null) return false;
    const elapsedSeconds = (this.clock.now() - this.lastRequestAt) / 1000;
    return elapsedSeconds < this.delay.minDelaySeconds;
  }

  /**
   * Pace the caller, then stamp the request time. Resolves with the
   * seconds waited. Once the wait starts it runs to completion.
   */
  async gate(): Promise<number> {
    let waited = 0;
    if (this.shouldDelay()) {
      waited = this.computeDelay();
      log.gate(waited);
      await this.clock.sleep(waited * 1000);
    }
    this.lastRequestAt = this.clock.now();
    return waited;
  }

  // ── Administration ─────────────────────────────────────────

  snapshot(): PolicySnapshot {
    return {
      pool: {
        userAgents: [...this.userAgents],
        proxies: this.proxies.map((p) => ({ ...p })),
      },
      delay: { ...this.delay },
    };
  }

  async addUserAgent(userAgent: string): Promise<PersistResult> {
    const trimmed = userAgent.trim();
    if (trimmed === '') {
      throw new Error('User-agent must be a non-empty string');
    }
    if (this.userAgents.includes(trimmed)) return { persisted: true };
    this.userAgents = [...this.userAgents, trimmed];
    return this.persistPool();
  }

  async removeUserAgent(userAgent: string): Promise<PersistResult> {
    if (!this.userAgents.includes(userAgent)) return { persisted: true };
    if (this.userAgents.length === 1) {
      throw new Error('Cannot remove the last user-agent from the identity pool');
    }
    this.userAgents = this.userAgents.filter((ua) => ua !== userAgent);
    return this.persistPool();
  }

  async addProxy(server: string, bypass?: string | null): Promise<PersistResult> {
    const trimmed = server.trim();
    if (trimmed === '') {
      throw new Error('Proxy server must be a non-empty string');
    }
    if (this.proxies.some((p) => p.server === trimmed)) return { persisted: true };
    const proxy: ProxyConfig = {
      server: trimmed,
      bypass: bypass === undefined ? PROXY_DEFAULTS.BYPASS : bypass,
    };
    this.proxies = [...this.proxies, proxy];
    return this.persistPool();
  }

  async removeProxy(server: string): Promise<PersistResult> {
    if (!this.proxies.some((p) => p.server === server)) return { persisted: true };
    this.proxies = this.proxies.filter((p) => p.server !== server);
    return this.persistPool();
  }

  async updateDelayPolicy(policy: DelayPolicy): Promise<PersistResult> {
    const next = delayPolicySchema.parse(policy);
    this.delay = next;
    return this.persist(() => this.store?.saveDelayPolicy({ ...next }));
  }

  private persistPool(): Promise<PersistResult> {
    const pool = this.snapshot().pool;
    return this.persist(() => this.store?.saveIdentityPool(pool));
  }

  private async persist(save: () => Promise<void> | undefined): Promise<PersistResult> {
    try {
      await save();
      return { persisted: true };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      log.warn(`Could not save anti-crawler settings: ${error.message}`);
      return { persisted: false, error };
    }
  }
}
