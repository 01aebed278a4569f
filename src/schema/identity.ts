import { z } from 'zod';

import { PROXY_DEFAULTS } from '../config/defaults.js';

// ── Proxy ─────────────────────────────────────────────────────

export const proxyConfigSchema = z.object({
  server: z.string().min(1),
  bypass: z.string().nullable().optional().default(PROXY_DEFAULTS.BYPASS),
});

export type ProxyConfig = z.output<typeof proxyConfigSchema>;

// ── Identity pool (persisted) ─────────────────────────────────

export const identityPoolSchema = z.object({
  userAgents: z.array(z.string().min(1)).min(1),
  proxies: z.array(proxyConfigSchema).default([]),
});

export type IdentityPool = z.output<typeof identityPoolSchema>;

// ── IdentityProfile (handed out per session) ──────────────────

export interface IdentityProfile {
  readonly userAgent: string;
  readonly proxy: Readonly<ProxyConfig> | null;
}

// ── DelayPolicy ───────────────────────────────────────────────

export const delayPolicySchema = z
  .object({
    minDelaySeconds: z.number().nonnegative(),
    maxDelaySeconds: z.number().nonnegative(),
    randomize: z.boolean(),
  })
  .refine((p) => p.maxDelaySeconds >= p.minDelaySeconds, {
    message: 'maxDelaySeconds must be greater than or equal to minDelaySeconds',
    path: ['maxDelaySeconds'],
  });

export type DelayPolicy = z.infer<typeof delayPolicySchema>;

export function parseDelayPolicy(data: unknown): DelayPolicy {
  return delayPolicySchema.parse(data);
}

export function parseIdentityPool(data: unknown): IdentityPool {
  return identityPoolSchema.parse(data);
}
